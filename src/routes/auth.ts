import { Router } from 'express';
import { DataSource } from 'typeorm';
import bcrypt from 'bcrypt';
import { v4 as uuidv4 } from 'uuid';
import { Department, Employee, User } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, refreshRequired, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { issueTokens, signToken } from '../services/tokens';
import { employeeSummary } from '../services/views';
import { FieldReader } from '../validation/fields';
import { badRequest, notFound, unauthorized } from '../utils/errors';
import { created, success } from '../utils/responses';
import { nowIso } from '../utils/dates';
import { ROLES } from '../types';

export default function authRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const users = dataSource.getRepository(User);
  const employees = dataSource.getRepository(Employee);

  router.post(
    '/login',
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const email = body.requireEmail('email');
      const password = body.requireString('password', { min: 1 });
      body.assertValid();

      const user = await users.findOneBy({ email });
      if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
        throw unauthorized('Invalid email or password');
      }
      if (!user.isActive) throw unauthorized('Your account is disabled');

      user.lastLogin = nowIso();
      await users.save(user);

      const employee = await employees.findOneBy({ userId: user.id });
      const identity = { id: user.id, email: user.email, role: user.role };
      return success(res, {
        ...issueTokens(identity, config),
        user: { ...identity, employee: employee ? employeeSummary(employee) : null },
      });
    })
  );

  router.post(
    '/refresh',
    refreshRequired(config.jwtSecret),
    asyncRoute(async (req, res) => {
      const user = await users.findOneBy({ id: currentUser(req).id });
      if (!user || !user.isActive) throw unauthorized('Invalid token');
      const accessToken = signToken({ id: user.id, email: user.email, role: user.role }, 'access', config);
      return success(res, { accessToken });
    })
  );

  router.use(authRequired(config.jwtSecret));

  router.post(
    '/register',
    requireRole('admin'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const email = body.requireEmail('email');
      const password = body.requireString('password', { min: 8 });
      const role = body.optionalEnum('role', ROLES) ?? 'employee';
      body.assertValid();

      if (await users.existsBy({ email })) throw badRequest('Email already registered');

      const user = users.create({
        id: uuidv4(),
        email,
        passwordHash: await bcrypt.hash(password, config.bcryptRounds),
        role,
        isActive: true,
        lastLogin: null,
      });
      await users.save(user);
      return created(res, { id: user.id, email: user.email, role: user.role, isActive: user.isActive });
    })
  );

  router.get(
    '/me',
    asyncRoute(async (req, res) => {
      const user = await users.findOneBy({ id: currentUser(req).id });
      if (!user) throw notFound('User not found');

      const employee = await employees.findOneBy({ userId: user.id });
      const department = employee?.departmentId
        ? await dataSource.getRepository(Department).findOneBy({ id: employee.departmentId })
        : null;

      return success(res, {
        user: {
          id: user.id,
          email: user.email,
          role: user.role,
          isActive: user.isActive,
          lastLogin: user.lastLogin,
          employee: employee ? { ...employeeSummary(employee), department: department?.name ?? null } : null,
        },
      });
    })
  );

  router.post(
    '/change-password',
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const currentPassword = body.requireString('currentPassword', { min: 1 });
      const newPassword = body.requireString('newPassword', { min: 8 });
      body.assertValid();

      const user = await users.findOneBy({ id: currentUser(req).id });
      if (!user || !(await bcrypt.compare(currentPassword, user.passwordHash))) {
        throw unauthorized('Current password is incorrect');
      }
      user.passwordHash = await bcrypt.hash(newPassword, config.bcryptRounds);
      await users.save(user);
      return success(res, { message: 'Password changed successfully' });
    })
  );

  // Tokens are stateless; clients drop them.
  router.post('/logout', (req, res) => success(res, { message: 'Logout successful' }));

  return router;
}
