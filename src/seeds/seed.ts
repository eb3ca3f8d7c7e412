import 'reflect-metadata';
import bcrypt from 'bcrypt';
import * as path from 'path';
import { promises as fs } from 'fs';
import { DataSource } from 'typeorm';
import AppDataSource from '../ormconfig';
import { v4 as uuidv4 } from 'uuid';
import { Attendance, Department, Employee, User } from '../entities';
import { AppConfig, loadConfig } from '../config';
import { FieldReader, isRecord } from '../validation/fields';
import { ATTENDANCE_STATUSES, AttendanceStatus, GENDERS, Gender, ROLES, Role, WORK_LOCATIONS, WorkLocation } from '../types';

export type SeedDepartment = { name: string; description: string | null };

export type SeedEmployee = {
  email: string;
  password?: string;
  role: Role;
  employeeCode: string;
  firstName: string;
  lastName: string;
  position: string | null;
  department: string | null;
  managerCode: string | null;
  dateOfJoining: string;
  dateOfBirth: string | null;
  gender: Gender | null;
};

export type SeedAttendance = {
  employeeCode: string;
  date: string;
  status: AttendanceStatus;
  clockIn: string | null;
  clockOut: string | null;
  workFrom: WorkLocation;
};

export type SeedData = {
  departments: SeedDepartment[];
  employees: SeedEmployee[];
  attendance: SeedAttendance[];
};

export type SeedResult = { departments: number; employees: number; attendance: number };

function entries(raw: Record<string, unknown>, key: string): unknown[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new Error(`Seed "${key}" must be a list`);
  return value;
}

function checked<T>(reader: FieldReader, where: string, value: T): T {
  if (!reader.valid) throw new Error(`Invalid seed entry in ${where}`);
  return value;
}

/** Validates the shape of a parsed seed document. */
export function parseSeed(raw: unknown): SeedData {
  if (!isRecord(raw)) throw new Error('Seed file must contain a JSON object');

  const departments = entries(raw, 'departments').map((d, i) => {
    const r = new FieldReader(d);
    const value = { name: r.requireString('name', { min: 1 }), description: r.nullableString('description') ?? null };
    return checked(r, `departments[${i}]`, value);
  });

  const employees = entries(raw, 'employees').map((e, i) => {
    const r = new FieldReader(e);
    const value: SeedEmployee = {
      email: r.requireEmail('email'),
      password: r.optionalString('password', { min: 8 }),
      role: r.optionalEnum('role', ROLES) ?? 'employee',
      employeeCode: r.requireString('employeeCode', { min: 1, max: 20 }),
      firstName: r.requireString('firstName', { min: 1, max: 50 }),
      lastName: r.requireString('lastName', { min: 1, max: 50 }),
      position: r.nullableString('position') ?? null,
      department: r.nullableString('department') ?? null,
      managerCode: r.nullableString('managerCode') ?? null,
      dateOfJoining: r.requireDate('dateOfJoining'),
      dateOfBirth: r.nullableDate('dateOfBirth') ?? null,
      gender: r.optionalEnum('gender', GENDERS) ?? null,
    };
    return checked(r, `employees[${i}]`, value);
  });

  const attendance = entries(raw, 'attendance').map((a, i) => {
    const r = new FieldReader(a);
    const value: SeedAttendance = {
      employeeCode: r.requireString('employeeCode', { min: 1 }),
      date: r.requireDate('date'),
      status: r.requireEnum('status', ATTENDANCE_STATUSES),
      clockIn: r.optionalInstant('clockIn') ?? null,
      clockOut: r.optionalInstant('clockOut') ?? null,
      workFrom: r.optionalEnum('workFrom', WORK_LOCATIONS) ?? 'office',
    };
    return checked(r, `attendance[${i}]`, value);
  });

  return { departments, employees, attendance };
}

export async function loadSeedFile(file = path.resolve(process.cwd(), 'src/seeds/data.json')): Promise<SeedData> {
  const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
  return parseSeed(raw);
}

/**
 * Inserts whatever part of the seed is missing. Departments match by name,
 * employees by code, attendance by employee and date; existing attendance
 * only has its status refreshed.
 */
export async function applySeed(dataSource: DataSource, seed: SeedData, config: AppConfig): Promise<SeedResult> {
  const result: SeedResult = { departments: 0, employees: 0, attendance: 0 };
  const deptRepo = dataSource.getRepository(Department);
  const userRepo = dataSource.getRepository(User);
  const empRepo = dataSource.getRepository(Employee);
  const attRepo = dataSource.getRepository(Attendance);

  for (const d of seed.departments) {
    if (await deptRepo.existsBy({ name: d.name })) continue;
    await deptRepo.save(deptRepo.create({ id: uuidv4(), ...d }));
    result.departments++;
  }

  const departmentIds = new Map((await deptRepo.find()).map(d => [d.name, d.id]));
  const defaultHash = await bcrypt.hash(config.defaultEmployeePassword, config.bcryptRounds);

  for (const e of seed.employees) {
    if (await empRepo.existsBy({ employeeCode: e.employeeCode })) continue;
    if (await userRepo.existsBy({ email: e.email })) {
      console.warn(`[seed] skipping ${e.employeeCode}: ${e.email} already has an account`);
      continue;
    }
    const passwordHash = e.password ? await bcrypt.hash(e.password, config.bcryptRounds) : defaultHash;
    await dataSource.transaction(async manager => {
      const user = manager.create(User, { id: uuidv4(), email: e.email, passwordHash, role: e.role, isActive: true });
      await manager.save(user);
      await manager.save(
        manager.create(Employee, {
          id: uuidv4(),
          userId: user.id,
          firstName: e.firstName,
          lastName: e.lastName,
          employeeCode: e.employeeCode,
          position: e.position,
          departmentId: e.department ? departmentIds.get(e.department) ?? null : null,
          dateOfJoining: e.dateOfJoining,
          dateOfBirth: e.dateOfBirth,
          gender: e.gender,
        })
      );
    });
    result.employees++;
  }

  // managers are linked once everyone exists
  const byCode = new Map((await empRepo.find()).map(e => [e.employeeCode, e]));
  for (const e of seed.employees) {
    const employee = byCode.get(e.employeeCode);
    const manager = e.managerCode ? byCode.get(e.managerCode) : undefined;
    if (employee && manager && employee.managerId !== manager.id && employee.id !== manager.id) {
      employee.managerId = manager.id;
      await empRepo.save(employee);
    }
  }

  for (const a of seed.attendance) {
    const employee = byCode.get(a.employeeCode);
    if (!employee) continue;
    const existing = await attRepo.findOneBy({ employeeId: employee.id, date: a.date });
    if (existing) {
      if (existing.status !== a.status) {
        existing.status = a.status;
        await attRepo.save(existing);
      }
      continue;
    }
    const { employeeCode: _code, ...record } = a;
    await attRepo.save(attRepo.create({ id: uuidv4(), employeeId: employee.id, ...record, notes: null }));
    result.attendance++;
  }

  return result;
}

async function runSeed() {
  const config = loadConfig();
  await AppDataSource.initialize();
  console.log('DataSource initialized for seeding');

  const result = await applySeed(AppDataSource, await loadSeedFile(), config);
  console.log(
    `Seeding complete. Departments inserted: ${result.departments}, Employees inserted: ${result.employees}, Attendance inserted: ${result.attendance}`
  );
  await AppDataSource.destroy();
}

if (require.main === module) {
  runSeed().catch(err => {
    console.error('Seed failed', err);
    process.exit(1);
  });
}
