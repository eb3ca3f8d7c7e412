import { DataSource } from 'typeorm';
import { Attendance, Department, Employee, User } from '../src/entities';
import { ADMIN_EMPLOYEE_CODE, ensureAdminAccount } from '../src/seeds/bootstrap';
import { applySeed, loadSeedFile, parseSeed, SeedData } from '../src/seeds/seed';
import { createTestDataSource, testConfig } from './helpers/testApp';

describe('parseSeed', () => {
  it('fills optional fields with defaults', () => {
    const seed = parseSeed({
      employees: [
        { email: 'A@Example.test', employeeCode: 'E1', firstName: 'Ann', lastName: 'Lee', dateOfJoining: '2024-02-01' },
      ],
    });
    expect(seed).toEqual({
      departments: [],
      employees: [
        {
          email: 'a@example.test',
          password: undefined,
          role: 'employee',
          employeeCode: 'E1',
          firstName: 'Ann',
          lastName: 'Lee',
          position: null,
          department: null,
          managerCode: null,
          dateOfJoining: '2024-02-01',
          dateOfBirth: null,
          gender: null,
        },
      ],
      attendance: [],
    });
  });

  it('names the entry that is wrong', () => {
    expect(() => parseSeed({ attendance: [{ employeeCode: 'E1', date: '2024-02-30', status: 'present' }] })).toThrow(
      'Invalid seed entry in attendance[0]'
    );
    expect(() => parseSeed({ departments: 'Sales' })).toThrow('Seed "departments" must be a list');
    expect(() => parseSeed([])).toThrow('Seed file must contain a JSON object');
  });
});

describe('seeding the database', () => {
  let dataSource: DataSource;
  const config = testConfig();

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  it('loads the bundled data once', async () => {
    const seed = await loadSeedFile();

    expect(await applySeed(dataSource, seed, config)).toEqual({ departments: 4, employees: 8, attendance: 64 });
    expect(await applySeed(dataSource, seed, config)).toEqual({ departments: 0, employees: 0, attendance: 0 });
    expect(await dataSource.getRepository(Attendance).count()).toBe(64);

    const employees = dataSource.getRepository(Employee);
    const manager = await employees.findOneByOrFail({ employeeCode: 'EMP002' });
    const report = await employees.findOneByOrFail({ employeeCode: 'EMP003' });
    expect(report.managerId).toBe(manager.id);
    const engineering = await dataSource.getRepository(Department).findOneByOrFail({ name: 'Engineering' });
    expect(report.departmentId).toBe(engineering.id);
  });

  it('refreshes the status of existing attendance', async () => {
    const base: SeedData = {
      departments: [],
      employees: [
        {
          email: 'ann@example.test',
          role: 'employee',
          employeeCode: 'E1',
          firstName: 'Ann',
          lastName: 'Lee',
          position: null,
          department: null,
          managerCode: null,
          dateOfJoining: '2024-02-01',
          dateOfBirth: null,
          gender: null,
        },
      ],
      attendance: [
        { employeeCode: 'E1', date: '2024-03-04', status: 'present', clockIn: null, clockOut: null, workFrom: 'office' },
      ],
    };
    await applySeed(dataSource, base, config);
    const changed = { ...base, attendance: [{ ...base.attendance[0], status: 'absent' as const }] };

    expect(await applySeed(dataSource, changed, config)).toEqual({ departments: 0, employees: 0, attendance: 0 });
    const [record] = await dataSource.getRepository(Attendance).find();
    expect(record.status).toBe('absent');
  });

  it('skips employees whose email already has an account', async () => {
    await ensureAdminAccount(dataSource, config);
    const seed = parseSeed({
      employees: [
        { email: 'admin@corestack.test', employeeCode: 'E9', firstName: 'Dup', lastName: 'Licate', dateOfJoining: '2024-02-01' },
      ],
    });

    expect((await applySeed(dataSource, seed, config)).employees).toBe(0);
    expect(console.warn).toHaveBeenCalledWith('[seed] skipping E9: admin@corestack.test already has an account');
  });

  it('creates the admin account once', async () => {
    expect(await ensureAdminAccount(dataSource, config)).toBe(true);
    expect(await ensureAdminAccount(dataSource, config)).toBe(false);

    const user = await dataSource.getRepository(User).findOneByOrFail({ email: 'admin@corestack.test' });
    expect(user.role).toBe('admin');
    const employee = await dataSource.getRepository(Employee).findOneByOrFail({ userId: user.id });
    expect(employee.employeeCode).toBe(ADMIN_EMPLOYEE_CODE);
    expect(console.log).toHaveBeenCalledWith('[bootstrap] created admin account admin@corestack.test');
  });

  it('creates nothing when ADMIN_EMAIL changes after the first boot', async () => {
    await ensureAdminAccount(dataSource, config);

    expect(await ensureAdminAccount(dataSource, testConfig({ ADMIN_EMAIL: 'root@corestack.test' }))).toBe(false);
    expect(await dataSource.getRepository(User).count()).toBe(1);
    expect(console.log).toHaveBeenCalledWith(
      '[bootstrap] administrator already present, not creating root@corestack.test'
    );
  });

  it('leaves the administrator profile alone after its account was demoted', async () => {
    await ensureAdminAccount(dataSource, config);
    await dataSource.getRepository(User).update({ email: 'admin@corestack.test' }, { role: 'hr' });

    expect(await ensureAdminAccount(dataSource, testConfig({ ADMIN_EMAIL: 'root@corestack.test' }))).toBe(false);
    expect(await dataSource.getRepository(Employee).countBy({ employeeCode: ADMIN_EMPLOYEE_CODE })).toBe(1);
  });
});
