import { Router } from 'express';
import { DataSource, FindOptionsWhere, ILike, In } from 'typeorm';
import bcrypt from 'bcrypt';
import { v4 as uuidv4 } from 'uuid';
import { Department, Employee, User } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { fullName } from '../services/views';
import { FieldReader, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { today } from '../utils/dates';
import { GENDERS, ROLES } from '../types';

type EditableField =
  | 'firstName'
  | 'lastName'
  | 'departmentId'
  | 'position'
  | 'dateOfBirth'
  | 'dateOfJoining'
  | 'phoneNumber'
  | 'address'
  | 'gender'
  | 'managerId'
  | 'profileImage';

const ALL_FIELDS: EditableField[] = [
  'firstName',
  'lastName',
  'departmentId',
  'position',
  'dateOfBirth',
  'dateOfJoining',
  'phoneNumber',
  'address',
  'gender',
  'managerId',
  'profileImage',
];
const CREATE_EXTRAS: EditableField[] = ALL_FIELDS.filter(
  f => f !== 'firstName' && f !== 'lastName' && f !== 'dateOfJoining'
);
const MANAGER_FIELDS: EditableField[] = ['firstName', 'lastName', 'phoneNumber', 'address'];
const SELF_FIELDS: EditableField[] = ['phoneNumber', 'address'];

/** Reads the editable subset of an employee payload; fields outside `allowed` are ignored. */
function readEmployeePatch(body: FieldReader, allowed: EditableField[]): Partial<Employee> {
  const may = (f: EditableField) => allowed.includes(f) && body.has(f);
  const patch: Partial<Employee> = {};
  const notFuture = today();

  if (may('firstName')) patch.firstName = body.requireString('firstName', { min: 1, max: 50 });
  if (may('lastName')) patch.lastName = body.requireString('lastName', { min: 1, max: 50 });
  if (may('departmentId')) patch.departmentId = body.nullableId('departmentId');
  if (may('position')) patch.position = body.nullableString('position', { max: 100 });
  if (may('dateOfBirth')) patch.dateOfBirth = body.nullableDate('dateOfBirth', { notFuture });
  if (may('dateOfJoining')) patch.dateOfJoining = body.requireDate('dateOfJoining', { notFuture });
  if (may('phoneNumber')) patch.phoneNumber = body.nullableString('phoneNumber', { max: 20 });
  if (may('address')) patch.address = body.nullableString('address');
  if (may('gender')) patch.gender = body.optionalEnum('gender', GENDERS);
  if (may('managerId')) patch.managerId = body.nullableId('managerId');
  if (may('profileImage')) patch.profileImage = body.nullableString('profileImage', { max: 255 });
  return patch;
}

export default function employeesRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(Employee);
  const departments = dataSource.getRepository(Department);
  const users = dataSource.getRepository(User);
  const access = new AccessPolicy(dataSource);

  // Adds department name, manager name and login email to each record.
  async function present(list: Employee[]) {
    if (list.length === 0) return [];
    const deptIds = [...new Set(list.map(e => e.departmentId).filter((id): id is string => id !== null))];
    const [depts, managers, accounts] = await Promise.all([
      deptIds.length ? departments.findBy({ id: In(deptIds) }) : Promise.resolve([]),
      access.employeesById(list.map(e => e.managerId)),
      users.findBy({ id: In(list.map(e => e.userId)) }),
    ]);
    const deptName = new Map(depts.map(d => [d.id, d.name]));
    const email = new Map(accounts.map(u => [u.id, u.email]));
    return list.map(e => {
      const manager = e.managerId ? managers.get(e.managerId) : undefined;
      return {
        ...e,
        fullName: fullName(e),
        email: email.get(e.userId) ?? null,
        department: e.departmentId ? deptName.get(e.departmentId) ?? null : null,
        manager: manager ? fullName(manager) : null,
      };
    });
  }

  async function presentOne(e: Employee) {
    const [view] = await present([e]);
    return view;
  }

  // Department and manager references must point at existing records.
  async function checkReferences(body: FieldReader, patch: Partial<Employee>, selfId?: string) {
    if (patch.departmentId && !(await departments.existsBy({ id: patch.departmentId }))) {
      body.fail('departmentId', 'Department not found.');
    }
    if (patch.managerId) {
      if (patch.managerId === selfId) body.fail('managerId', 'An employee cannot manage themselves.');
      else if (!(await repo.existsBy({ id: patch.managerId }))) body.fail('managerId', 'Manager not found.');
    }
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/departments',
    asyncRoute(async (req, res) => {
      const list = await departments.find({ order: { name: 'ASC' } });
      const counts = await Promise.all(list.map(d => repo.countBy({ departmentId: d.id })));
      return success(
        res,
        list.map((d, i) => ({ ...d, employeeCount: counts[i] }))
      );
    })
  );

  router.post(
    '/departments',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const name = body.requireString('name', { min: 1, max: 100 });
      const description = body.nullableString('description') ?? null;
      body.assertValid();

      if (await departments.existsBy({ name })) throw badRequest('Department already exists');
      const dept = departments.create({ id: uuidv4(), name, description });
      await departments.save(dept);
      return created(res, dept);
    })
  );

  router.put(
    '/departments/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const dept = await departments.findOneBy({ id: req.params.id });
      if (!dept) throw notFound('Department not found');

      const body = new FieldReader(req.body);
      const name = body.optionalString('name', { min: 1, max: 100 });
      const description = body.nullableString('description');
      body.assertValid();

      if (name !== undefined && name !== dept.name) {
        if (await departments.existsBy({ name })) throw badRequest('Department name already exists');
        dept.name = name;
      }
      if (description !== undefined) dept.description = description;
      await departments.save(dept);
      return success(res, dept);
    })
  );

  router.delete(
    '/departments/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const dept = await departments.findOneBy({ id: req.params.id });
      if (!dept) throw notFound('Department not found');
      if (await repo.existsBy({ departmentId: dept.id })) {
        throw badRequest('Cannot delete department with assigned employees');
      }
      await departments.remove(dept);
      return success(res, { message: 'Department deleted successfully' });
    })
  );

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const page = pageRequest(req.query, config);
      const departmentId = queryString(req.query, 'departmentId');
      const search = queryString(req.query, 'search');

      const base: FindOptionsWhere<Employee> = departmentId ? { departmentId } : {};
      const like = search ? ILike(`%${search}%`) : undefined;
      const where: FindOptionsWhere<Employee>[] = like
        ? [
            { ...base, firstName: like },
            { ...base, lastName: like },
            { ...base, employeeCode: like },
            { ...base, position: like },
          ]
        : [base];

      const [items, total] = await repo.findAndCount({
        where,
        order: { lastName: 'ASC', firstName: 'ASC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const employee = await repo.findOneBy({ id: req.params.id });
      if (!employee) throw notFound('Employee not found');
      if (!(await access.canSeeEmployee(currentUser(req), employee))) {
        throw forbidden("You don't have permission to view this employee");
      }
      return success(res, await presentOne(employee));
    })
  );

  router.post(
    '/',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const email = body.requireEmail('email');
      const employeeCode = body.requireString('employeeCode', { min: 1, max: 20 });
      const password = body.optionalString('password', { min: 8 }) ?? config.defaultEmployeePassword;
      const role = body.optionalEnum('role', ROLES) ?? 'employee';
      const patch = readEmployeePatch(body, CREATE_EXTRAS);
      const firstName = body.requireString('firstName', { min: 1, max: 50 });
      const lastName = body.requireString('lastName', { min: 1, max: 50 });
      const dateOfJoining = body.requireDate('dateOfJoining', { notFuture: today() });
      await checkReferences(body, patch);
      body.assertValid();

      // Only an admin may hand out anything above a plain employee account.
      if (role !== 'employee' && currentUser(req).role !== 'admin') {
        throw forbidden(`Only administrators can create ${role} accounts`);
      }

      if (await users.existsBy({ email })) throw badRequest('Email already exists');
      if (await repo.existsBy({ employeeCode })) throw badRequest('Employee code already exists');

      const passwordHash = await bcrypt.hash(password, config.bcryptRounds);
      const employee = await dataSource.transaction(async manager => {
        const user = manager.create(User, {
          id: uuidv4(),
          email,
          passwordHash,
          role,
          isActive: true,
          lastLogin: null,
        });
        await manager.save(user);
        const record = manager.create(Employee, {
          departmentId: null,
          position: null,
          dateOfBirth: null,
          phoneNumber: null,
          address: null,
          gender: null,
          managerId: null,
          profileImage: null,
          ...patch,
          id: uuidv4(),
          userId: user.id,
          firstName,
          lastName,
          employeeCode,
          dateOfJoining,
        });
        return manager.save(record);
      });
      return created(res, await presentOne(employee));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await repo.findOneBy({ id: req.params.id });
      if (!employee) throw notFound('Employee not found');

      let allowed = ALL_FIELDS;
      if (!isPrivileged(user)) {
        const own = await access.employeeForUser(user.id);
        const isSelf = own?.id === employee.id;
        const isReport = user.role === 'manager' && own !== null && employee.managerId === own.id;
        if (!isSelf && !isReport) throw forbidden("You don't have permission to update this employee");
        allowed = user.role === 'manager' ? MANAGER_FIELDS : SELF_FIELDS;
      }

      const body = new FieldReader(req.body);
      const patch = readEmployeePatch(body, allowed);
      await checkReferences(body, patch, employee.id);
      body.assertValid();

      repo.merge(employee, patch);
      await repo.save(employee);
      return success(res, await presentOne(employee));
    })
  );

  router.delete(
    '/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const employee = await repo.findOneBy({ id: req.params.id });
      if (!employee) throw notFound('Employee not found');

      await dataSource.transaction(async manager => {
        await manager.update(User, { id: employee.userId }, { isActive: false });
        await manager.softDelete(Employee, { id: employee.id });
      });
      return success(res, { message: 'Employee deactivated successfully' });
    })
  );

  return router;
}
