import bcrypt from 'bcrypt';
import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee, User } from '../entities';
import { AppConfig } from '../config';
import { today } from '../utils/dates';

export const ADMIN_EMPLOYEE_CODE = 'EMPADMIN';

/**
 * Creates the first administrator (account plus employee profile) on an
 * empty installation. Returns true if it did; once any admin account or the
 * administrator's employee profile exists, changing `ADMIN_EMAIL` creates
 * nothing.
 */
export async function ensureAdminAccount(dataSource: DataSource, config: AppConfig): Promise<boolean> {
  const email = config.admin.email.toLowerCase();
  const users = dataSource.getRepository(User);
  if (await users.existsBy({ email })) return false;

  const adminExists = await users.existsBy({ role: 'admin' });
  const profileExists = await dataSource
    .getRepository(Employee)
    .exists({ where: { employeeCode: ADMIN_EMPLOYEE_CODE }, withDeleted: true });
  if (adminExists || profileExists) {
    console.log(`[bootstrap] administrator already present, not creating ${email}`);
    return false;
  }

  const passwordHash = await bcrypt.hash(config.admin.password, config.bcryptRounds);
  await dataSource.transaction(async manager => {
    const user = manager.create(User, { id: uuidv4(), email, passwordHash, role: 'admin', isActive: true });
    await manager.save(user);
    await manager.save(
      manager.create(Employee, {
        id: uuidv4(),
        userId: user.id,
        firstName: 'System',
        lastName: 'Administrator',
        employeeCode: ADMIN_EMPLOYEE_CODE,
        position: 'Administrator',
        dateOfJoining: today(),
      })
    );
  });
  console.log(`[bootstrap] created admin account ${email}`);
  return true;
}
