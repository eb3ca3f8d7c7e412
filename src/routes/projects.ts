import { Router } from 'express';
import { DataSource, FindOptionsWhere, ILike, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee, Project, ProjectMember, Task } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { personRef } from '../services/views';
import { FieldReader, isRecord, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { round2 } from '../utils/dates';
import { PROJECT_MEMBER_ROLES, PROJECT_STATUSES, ProjectMemberRole, TaskStatus } from '../types';

export function completionRate(statuses: TaskStatus[]): number {
  if (statuses.length === 0) return 0;
  return round2((statuses.filter(s => s === 'completed').length / statuses.length) * 100);
}

export default function projectsRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(Project);
  const members = dataSource.getRepository(ProjectMember);
  const tasks = dataSource.getRepository(Task);
  const employees = dataSource.getRepository(Employee);
  const access = new AccessPolicy(dataSource);

  async function memberViews(list: ProjectMember[]) {
    const people = await access.employeesById(list.map(m => m.employeeId));
    return list.map(m => ({ ...m, employee: personRef(people.get(m.employeeId)) }));
  }

  async function present(list: Project[]) {
    if (list.length === 0) return [];
    const ids = list.map(p => p.id);
    const [taskRows, memberRows, people] = await Promise.all([
      tasks.find({ where: { projectId: In(ids) }, select: { projectId: true, status: true } }),
      members.findBy({ projectId: In(ids) }),
      access.employeesById(list.map(p => p.createdBy)),
    ]);
    return list.map(p => {
      const statuses = taskRows.filter(t => t.projectId === p.id).map(t => t.status);
      return {
        ...p,
        creator: personRef(people.get(p.createdBy)),
        memberCount: memberRows.filter(m => m.projectId === p.id).length,
        taskCount: statuses.length,
        completedTaskCount: statuses.filter(s => s === 'completed').length,
        completionRate: completionRate(statuses),
      };
    });
  }

  async function presentOne(p: Project) {
    const [view] = await present([p]);
    const list = await members.find({ where: { projectId: p.id }, order: { joinedAt: 'ASC' } });
    return { ...view, members: await memberViews(list) };
  }

  async function loadProject(id: string): Promise<Project> {
    const project = await repo.findOneBy({ id });
    if (!project) throw notFound('Project not found');
    return project;
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const status = queryEnum(req.query, 'status', PROJECT_STATUSES, 'status');
      const search = queryString(req.query, 'search');
      const page = pageRequest(req.query, config);

      const base: FindOptionsWhere<Project> = {};
      if (!isPrivileged(user)) base.id = In(await access.projectIdsFor(employee.id));
      if (status) base.status = status;
      const like = search ? ILike(`%${search}%`) : undefined;
      const where = like ? [{ ...base, name: like }, { ...base, description: like }] : [base];

      const [items, total] = await repo.findAndCount({
        where,
        order: { startDate: 'DESC', createdAt: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canAccessProject(user, employee, project))) {
        throw forbidden("You don't have access to this project");
      }
      return success(res, await presentOne(project));
    })
  );

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id);
      const body = new FieldReader(req.body);
      const name = body.requireString('name', { min: 1, max: 100 });
      const description = body.nullableString('description') ?? null;
      const status = body.optionalEnum('status', PROJECT_STATUSES) ?? 'planning';
      const startDate = body.nullableDate('startDate') ?? null;
      const endDate = body.nullableDate('endDate') ?? null;
      const budget = body.nullableNumber('budget', { min: 0 }) ?? null;
      const rawMembers = body.optionalList('members') ?? [];

      const extra = new Map<string, ProjectMemberRole>();
      rawMembers.forEach((raw, i) => {
        const entry = new FieldReader(raw);
        const employeeId = entry.requireId('employeeId');
        const role = entry.optionalEnum('role', PROJECT_MEMBER_ROLES) ?? 'member';
        if (!isRecord(raw) || !entry.valid) body.fail('members', `Entry ${i} is not a valid member.`);
        else if (employeeId !== employee.id) extra.set(employeeId, role);
      });
      if (startDate && endDate) body.check(endDate >= startDate, 'endDate', 'End date must be after start date.');
      body.assertValid();

      const known = extra.size ? await employees.findBy({ id: In([...extra.keys()]) }) : [];
      const missing = [...extra.keys()].filter(id => !known.some(e => e.id === id));
      if (missing.length) throw notFound(`Employee not found: ${missing.join(', ')}`);

      const project = await dataSource.transaction(async manager => {
        const record = manager.create(Project, {
          id: uuidv4(),
          name,
          description,
          status,
          startDate,
          endDate,
          budget,
          createdBy: employee.id,
        });
        await manager.save(record);
        const rows = [
          manager.create(ProjectMember, {
            id: uuidv4(),
            projectId: record.id,
            employeeId: employee.id,
            role: 'project manager',
          }),
          ...[...extra].map(([employeeId, role]) =>
            manager.create(ProjectMember, { id: uuidv4(), projectId: record.id, employeeId, role })
          ),
        ];
        await manager.save(rows);
        return record;
      });
      return created(res, await presentOne(project));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canManageProject(user, employee, project))) {
        throw forbidden("You don't have permission to update this project");
      }

      const body = new FieldReader(req.body);
      const name = body.optionalString('name', { min: 1, max: 100 });
      const description = body.nullableString('description');
      const status = body.optionalEnum('status', PROJECT_STATUSES);
      const startDate = body.nullableDate('startDate');
      const endDate = body.nullableDate('endDate');
      const budget = body.nullableNumber('budget', { min: 0 });
      const nextStart = startDate === undefined ? project.startDate : startDate;
      const nextEnd = endDate === undefined ? project.endDate : endDate;
      if (nextStart && nextEnd) body.check(nextEnd >= nextStart, 'endDate', 'End date must be after start date.');
      body.assertValid();

      if (name !== undefined) project.name = name;
      if (description !== undefined) project.description = description;
      if (status !== undefined) project.status = status;
      if (budget !== undefined) project.budget = budget;
      project.startDate = nextStart;
      project.endDate = nextEnd;
      await repo.save(project);
      return success(res, await presentOne(project));
    })
  );

  router.delete(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!isPrivileged(user) && project.createdBy !== employee.id) {
        throw forbidden("You don't have permission to delete this project");
      }

      if ((await tasks.countBy({ projectId: project.id })) > 0) {
        project.status = 'cancelled';
        await repo.save(project);
        return success(res, { message: 'Project marked as cancelled because it has associated tasks' });
      }
      await dataSource.transaction(async manager => {
        await manager.delete(ProjectMember, { projectId: project.id });
        await manager.delete(Project, { id: project.id });
      });
      return success(res, { message: 'Project deleted successfully' });
    })
  );

  router.get(
    '/:id/members',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canAccessProject(user, employee, project))) {
        throw forbidden("You don't have access to this project");
      }
      const list = await members.find({ where: { projectId: project.id }, order: { joinedAt: 'ASC' } });
      return success(res, await memberViews(list));
    })
  );

  router.post(
    '/:id/members',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canManageProject(user, employee, project))) {
        throw forbidden("You don't have permission to add members to this project");
      }

      const body = new FieldReader(req.body);
      const employeeId = body.requireId('employeeId');
      const role = body.optionalEnum('role', PROJECT_MEMBER_ROLES) ?? 'member';
      body.assertValid();

      if (!(await employees.existsBy({ id: employeeId }))) throw notFound('Employee not found');
      if (await access.membership(project.id, employeeId)) {
        throw badRequest('Employee is already a member of this project');
      }
      const member = members.create({ id: uuidv4(), projectId: project.id, employeeId, role });
      await members.save(member);
      const [view] = await memberViews([member]);
      return created(res, view);
    })
  );

  router.put(
    '/:id/members/:employeeId',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canManageProject(user, employee, project))) {
        throw forbidden("You don't have permission to update member roles in this project");
      }
      const member = await access.membership(project.id, req.params.employeeId);
      if (!member) throw notFound('Employee is not a member of this project');

      const body = new FieldReader(req.body);
      const role = body.requireEnum('role', PROJECT_MEMBER_ROLES);
      body.assertValid();

      member.role = role;
      await members.save(member);
      const [view] = await memberViews([member]);
      return success(res, view);
    })
  );

  router.delete(
    '/:id/members/:employeeId',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const project = await loadProject(req.params.id);
      if (!(await access.canManageProject(user, employee, project))) {
        throw forbidden("You don't have permission to remove members from this project");
      }
      const member = await access.membership(project.id, req.params.employeeId);
      if (!member) throw notFound('Employee is not a member of this project');
      if (project.createdBy === member.employeeId && member.role === 'project manager') {
        throw badRequest('Cannot remove the project creator');
      }
      await members.remove(member);
      return success(res, { message: 'Member removed successfully' });
    })
  );

  return router;
}
