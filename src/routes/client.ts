import { Router } from 'express';
import { DataSource, FindOptionsWhere, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { ClientAccess, Employee, Project, ProjectMember, Task, TaskComment, User } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy } from '../services/access';
import { personRef } from '../services/views';
import { FieldReader, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import type { AuthUser } from '../types';

type AccessFlags = Pick<ClientAccess, 'canViewTasks' | 'canViewComments' | 'canViewTeam'>;

const FLAG_FIELDS = ['canViewTasks', 'canViewComments', 'canViewTeam'] as const;

type ClientProjectView = {
  project: Pick<Project, 'id' | 'name' | 'description' | 'status' | 'startDate' | 'endDate'>;
  tasks?: Pick<Task, 'id' | 'title' | 'description' | 'status' | 'priority' | 'progress' | 'dueDate'>[];
  members?: Pick<Employee, 'id' | 'firstName' | 'lastName' | 'position'>[];
  comments?: Pick<TaskComment, 'id' | 'taskId' | 'comment' | 'createdAt'>[];
};

const DEFAULT_FLAGS: AccessFlags = {
  canViewTasks: true,
  canViewComments: false,
  canViewTeam: true,
};

function readFlags(body: FieldReader): Partial<AccessFlags> {
  const flags: Partial<AccessFlags> = {};
  for (const field of FLAG_FIELDS) {
    const value = body.optionalBoolean(field);
    if (value !== undefined) flags[field] = value;
  }
  return flags;
}

/**
 * Grants for `client` users and the read-only project pages they see.
 * Admins manage every grant; managers only grants on projects they created.
 */
export default function clientRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const grants = dataSource.getRepository(ClientAccess);
  const projects = dataSource.getRepository(Project);
  const access = new AccessPolicy(dataSource);

  async function present(list: ClientAccess[]) {
    if (list.length === 0) return [];
    const [clients, projectRows, people] = await Promise.all([
      dataSource.getRepository(User).findBy({ id: In(list.map(g => g.clientId)) }),
      projects.findBy({ id: In(list.map(g => g.projectId)) }),
      access.employeesById(list.map(g => g.createdBy)),
    ]);
    return list.map(g => {
      const client = clients.find(u => u.id === g.clientId);
      const project = projectRows.find(p => p.id === g.projectId);
      return {
        ...g,
        client: client ? { id: client.id, email: client.email, role: client.role } : null,
        project: project ? { id: project.id, name: project.name, status: project.status } : null,
        creator: personRef(people.get(g.createdBy)),
      };
    });
  }

  async function loadGrant(id: string): Promise<ClientAccess> {
    const grant = await grants.findOneBy({ id });
    if (!grant) throw notFound('Client access record not found');
    return grant;
  }

  async function ownedProjectIds(user: AuthUser): Promise<string[]> {
    const own = await access.requireEmployee(user.id);
    const rows = await projects.find({ where: { createdBy: own.id }, select: { id: true } });
    return rows.map(p => p.id);
  }

  /** Managers may only handle grants on projects they created. */
  async function assertManages(user: AuthUser, grant: ClientAccess, message: string) {
    if (user.role !== 'manager') return;
    if (!(await ownedProjectIds(user)).includes(grant.projectId)) throw forbidden(message);
  }

  /** What a client sees of one project, trimmed by the grant's flags. */
  async function projectView(project: Project, grant: ClientAccess): Promise<ClientProjectView> {
    const view: ClientProjectView = {
      project: {
        id: project.id,
        name: project.name,
        description: project.description,
        status: project.status,
        startDate: project.startDate,
        endDate: project.endDate,
      },
    };
    const taskRows =
      grant.canViewTasks || grant.canViewComments
        ? await dataSource.getRepository(Task).find({ where: { projectId: project.id }, order: { createdAt: 'ASC' } })
        : [];

    if (grant.canViewTasks) {
      view.tasks = taskRows.map(t => ({
        id: t.id,
        title: t.title,
        description: t.description,
        status: t.status,
        priority: t.priority,
        progress: t.progress,
        dueDate: t.dueDate,
      }));
    }
    if (grant.canViewTeam) {
      const members = await dataSource
        .getRepository(ProjectMember)
        .find({ where: { projectId: project.id }, order: { joinedAt: 'ASC' } });
      const people = await dataSource.getRepository(Employee).findBy({ id: In(members.map(m => m.employeeId)) });
      view.members = members.flatMap(m => {
        const e = people.find(p => p.id === m.employeeId);
        return e ? [{ id: e.id, firstName: e.firstName, lastName: e.lastName, position: e.position }] : [];
      });
    }
    if (grant.canViewComments) {
      const comments = taskRows.length
        ? await dataSource
            .getRepository(TaskComment)
            .find({ where: { taskId: In(taskRows.map(t => t.id)) }, order: { createdAt: 'ASC' } })
        : [];
      view.comments = comments.map(c => ({ id: c.id, taskId: c.taskId, comment: c.comment, createdAt: c.createdAt }));
    }
    return view;
  }

  router.use(authRequired(config.jwtSecret));

  // Grants

  router.get(
    '/access',
    requireRole('admin', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const clientId = queryString(req.query, 'clientId');
      const projectId = queryString(req.query, 'projectId');
      const page = pageRequest(req.query, config);

      const where: FindOptionsWhere<ClientAccess> = {};
      if (clientId) where.clientId = clientId;
      if (user.role === 'manager') {
        const owned = await ownedProjectIds(user);
        where.projectId = In(projectId ? owned.filter(id => id === projectId) : owned);
      } else if (projectId) {
        where.projectId = projectId;
      }

      const [items, total] = await grants.findAndCount({
        where,
        order: { createdAt: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.get(
    '/access/:id',
    requireRole('admin', 'manager', 'client'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const grant = await loadGrant(req.params.id);
      const denied = "You don't have permission to view this access record";
      if (user.role === 'client' && grant.clientId !== user.id) throw forbidden(denied);
      await assertManages(user, grant, denied);
      const [view] = await present([grant]);
      return success(res, view);
    })
  );

  router.post(
    '/access',
    requireRole('admin', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const creator = await access.requireEmployee(user.id);
      const body = new FieldReader(req.body);
      const clientId = body.requireId('clientId');
      const projectId = body.requireId('projectId');
      const flags = readFlags(body);
      body.assertValid();

      const client = await dataSource.getRepository(User).findOneBy({ id: clientId });
      if (!client || client.role !== 'client') throw badRequest('User must exist and have the client role');
      const project = await projects.findOneBy({ id: projectId });
      if (!project) throw notFound('Project not found');
      if (user.role === 'manager' && project.createdBy !== creator.id) {
        throw forbidden('You can only grant access to projects you manage');
      }
      if (await grants.existsBy({ clientId, projectId })) {
        throw badRequest('This client already has access to this project');
      }

      const grant = grants.create({ ...DEFAULT_FLAGS, ...flags, id: uuidv4(), clientId, projectId, createdBy: creator.id });
      await grants.save(grant);
      const [view] = await present([grant]);
      return created(res, view);
    })
  );

  router.put(
    '/access/:id',
    requireRole('admin', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const grant = await loadGrant(req.params.id);
      await assertManages(user, grant, 'You can only update access for projects you manage');

      const body = new FieldReader(req.body);
      const flags = readFlags(body);
      body.assertValid();

      Object.assign(grant, flags);
      await grants.save(grant);
      const [view] = await present([grant]);
      return success(res, view);
    })
  );

  router.delete(
    '/access/:id',
    requireRole('admin', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const grant = await loadGrant(req.params.id);
      await assertManages(user, grant, 'You can only delete access for projects you manage');
      await grants.remove(grant);
      return success(res, { message: 'Client access deleted successfully' });
    })
  );

  // Client portal

  router.get(
    '/projects',
    requireRole('client'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const page = pageRequest(req.query, config);
      const mine = await grants.findBy({ clientId: user.id });

      const [items, total] = await projects.findAndCount({
        where: { id: In(mine.map(g => g.projectId)) },
        order: { name: 'ASC' },
        skip: page.skip,
        take: page.take,
      });
      const views = await Promise.all(
        items.flatMap(p => {
          const grant = mine.find(g => g.projectId === p.id);
          return grant ? [projectView(p, grant)] : [];
        })
      );
      return paginated(res, toPage(views, total, page));
    })
  );

  router.get(
    '/projects/:id',
    requireRole('client'),
    asyncRoute(async (req, res) => {
      const grant = await grants.findOneBy({ clientId: currentUser(req).id, projectId: req.params.id });
      if (!grant) throw forbidden("You don't have access to this project");
      const project = await projects.findOneBy({ id: req.params.id });
      if (!project) throw notFound('Project not found');
      return success(res, await projectView(project, grant));
    })
  );

  return router;
}
