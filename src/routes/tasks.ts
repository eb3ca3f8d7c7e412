import { Router } from 'express';
import { DataSource, FindOptionsWhere, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee, Project, Task, TaskComment } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { personRef } from '../services/views';
import { FieldReader, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, slicePage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { nowIso, today } from '../utils/dates';
import { TASK_PRIORITIES, TASK_STATUSES, TaskStatus } from '../types';

/** Kanban order: due date ascending with undated tasks last, then newest first. */
export function compareTasks(a: Task, b: Task): number {
  if (a.dueDate !== b.dueDate) {
    if (a.dueDate === null) return 1;
    if (b.dueDate === null) return -1;
    return a.dueDate < b.dueDate ? -1 : 1;
  }
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/** Keeps `completedAt` and `progress` consistent with a status change. */
export function applyStatus(task: Task, next: TaskStatus): void {
  if (next === 'completed' && task.status !== 'completed') {
    task.completedAt = nowIso();
    task.progress = 100;
  } else if (next !== 'completed') {
    task.completedAt = null;
  }
  task.status = next;
}

export default function tasksRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(Task);
  const comments = dataSource.getRepository(TaskComment);
  const projects = dataSource.getRepository(Project);
  const access = new AccessPolicy(dataSource);

  async function present(list: Task[]) {
    if (list.length === 0) return [];
    const [people, projectRows] = await Promise.all([
      access.employeesById(list.flatMap(t => [t.assigneeId, t.createdBy])),
      projects.findBy({ id: In([...new Set(list.map(t => t.projectId))]) }),
    ]);
    const projectName = new Map(projectRows.map(p => [p.id, p.name]));
    return list.map(t => ({
      ...t,
      project: { id: t.projectId, name: projectName.get(t.projectId) ?? null },
      assignee: t.assigneeId ? personRef(people.get(t.assigneeId)) : null,
      creator: personRef(people.get(t.createdBy)),
    }));
  }

  async function commentViews(list: TaskComment[]) {
    const people = await access.employeesById(list.map(c => c.employeeId));
    return list.map(c => ({ ...c, author: personRef(people.get(c.employeeId)) }));
  }

  async function loadTask(id: string): Promise<Task> {
    const task = await repo.findOneBy({ id });
    if (!task) throw notFound('Task not found');
    return task;
  }

  async function checkAssignee(project: Project, assigneeId: string) {
    if (!(await dataSource.getRepository(Employee).existsBy({ id: assigneeId }))) {
      throw notFound('Assignee not found');
    }
    if (!(await access.isAssignable(project, assigneeId))) {
      throw badRequest('Assignee is not a member of this project');
    }
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const projectId = queryString(req.query, 'projectId');
      const assigneeId = queryString(req.query, 'assigneeId');
      const status = queryEnum(req.query, 'status', TASK_STATUSES, 'status');
      const priority = queryEnum(req.query, 'priority', TASK_PRIORITIES, 'priority');
      const search = queryString(req.query, 'search')?.toLowerCase();
      const page = pageRequest(req.query, config);

      const where: FindOptionsWhere<Task> = {};
      if (projectId) where.projectId = projectId;
      if (assigneeId) where.assigneeId = assigneeId;
      if (status) where.status = status;
      if (priority) where.priority = priority;
      let list = await repo.find({ where });

      if (!isPrivileged(user)) {
        const visible = new Set(await access.projectIdsFor(employee.id));
        list = list.filter(
          t => visible.has(t.projectId) || t.assigneeId === employee.id || t.createdBy === employee.id
        );
      }
      if (search) {
        list = list.filter(
          t => t.title.toLowerCase().includes(search) || (t.description ?? '').toLowerCase().includes(search)
        );
      }
      list.sort(compareTasks);

      const slice = slicePage(list, page);
      return paginated(res, { ...slice, items: await present(slice.items) });
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const task = await loadTask(req.params.id);
      if (!(await access.canAccessTask(user, employee, task))) {
        throw forbidden("You don't have access to this task");
      }
      const [view] = await present([task]);
      const list = await comments.find({ where: { taskId: task.id }, order: { createdAt: 'ASC' } });
      return success(res, { ...view, comments: await commentViews(list) });
    })
  );

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const body = new FieldReader(req.body);
      const title = body.requireString('title', { min: 1, max: 200 });
      const description = body.nullableString('description') ?? null;
      const projectId = body.requireId('projectId');
      const assigneeId = body.nullableId('assigneeId') ?? null;
      const status = body.optionalEnum('status', TASK_STATUSES) ?? 'todo';
      const priority = body.optionalEnum('priority', TASK_PRIORITIES) ?? 'medium';
      const progress = body.optionalNumber('progress', { min: 0, max: 100, integer: true }) ?? 0;
      const estimatedHours = body.nullableNumber('estimatedHours', { min: 0 }) ?? null;
      const dueDate = body.nullableDate('dueDate', { notPast: today() }) ?? null;
      body.assertValid();

      const project = await projects.findOneBy({ id: projectId });
      if (!project) throw notFound('Project not found');
      if (!isPrivileged(user) && !(await access.isAssignable(project, employee.id))) {
        throw forbidden("You don't have permission to create tasks in this project");
      }
      if (assigneeId) await checkAssignee(project, assigneeId);

      const task = repo.create({
        id: uuidv4(),
        title,
        description,
        projectId,
        assigneeId,
        createdBy: employee.id,
        status: 'todo',
        priority,
        progress,
        estimatedHours,
        dueDate,
        completedAt: null,
      });
      applyStatus(task, status);
      await repo.save(task);
      const [view] = await present([task]);
      return created(res, view);
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const task = await loadTask(req.params.id);
      const level = await access.taskEditAccess(user, employee, task);
      if (level === 'none') throw forbidden("You don't have permission to update this task");
      const full = level === 'full';

      const body = new FieldReader(req.body);
      const status = body.optionalEnum('status', TASK_STATUSES);
      const progress = body.optionalNumber('progress', { min: 0, max: 100, integer: true });
      const estimatedHours = body.nullableNumber('estimatedHours', { min: 0 });
      // assignees may only move their own work along
      const title = full ? body.optionalString('title', { min: 1, max: 200 }) : undefined;
      const description = full ? body.nullableString('description') : undefined;
      const priority = full ? body.optionalEnum('priority', TASK_PRIORITIES) : undefined;
      const assigneeId = full ? body.nullableId('assigneeId') : undefined;
      const dueDate = full ? body.nullableDate('dueDate', { notPast: today() }) : undefined;
      body.assertValid();

      if (assigneeId && assigneeId !== task.assigneeId) {
        const project = await projects.findOneBy({ id: task.projectId });
        if (!project) throw notFound('Project not found');
        await checkAssignee(project, assigneeId);
      }

      if (title !== undefined) task.title = title;
      if (description !== undefined) task.description = description;
      if (priority !== undefined) task.priority = priority;
      if (assigneeId !== undefined) task.assigneeId = assigneeId;
      if (dueDate !== undefined) task.dueDate = dueDate;
      if (estimatedHours !== undefined) task.estimatedHours = estimatedHours;
      if (progress !== undefined) task.progress = progress;
      if (status !== undefined) applyStatus(task, status);
      await repo.save(task);
      const [view] = await present([task]);
      return success(res, view);
    })
  );

  router.delete(
    '/:id',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const task = await loadTask(req.params.id);
      if ((await access.taskEditAccess(user, employee, task)) !== 'full') {
        throw forbidden("You don't have permission to delete this task");
      }
      await dataSource.transaction(async manager => {
        await manager.delete(TaskComment, { taskId: task.id });
        await manager.delete(Task, { id: task.id });
      });
      return success(res, { message: 'Task deleted successfully' });
    })
  );

  router.get(
    '/:id/comments',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const task = await loadTask(req.params.id);
      if (!(await access.canAccessTask(user, employee, task))) {
        throw forbidden("You don't have access to this task");
      }
      const list = await comments.find({ where: { taskId: task.id }, order: { createdAt: 'ASC' } });
      return success(res, await commentViews(list));
    })
  );

  router.post(
    '/:id/comments',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const task = await loadTask(req.params.id);
      if (!(await access.canAccessTask(user, employee, task))) {
        throw forbidden("You don't have permission to comment on this task");
      }
      const body = new FieldReader(req.body);
      const text = body.requireString('comment', { min: 1 });
      body.assertValid();

      const comment = comments.create({ id: uuidv4(), taskId: task.id, employeeId: employee.id, comment: text });
      await comments.save(comment);
      const [view] = await commentViews([comment]);
      return created(res, view);
    })
  );

  async function loadComment(taskId: string, commentId: string, userId: string) {
    const caller = await access.requireEmployee(userId);
    const comment = await comments.findOneBy({ id: commentId, taskId });
    if (!comment) throw notFound('Comment not found');
    return { comment, caller };
  }

  router.put(
    '/:id/comments/:commentId',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const { comment, caller } = await loadComment(req.params.id, req.params.commentId, user.id);
      if (comment.employeeId !== caller.id && !isPrivileged(user)) {
        throw forbidden("You don't have permission to update this comment");
      }
      const body = new FieldReader(req.body);
      const text = body.requireString('comment', { min: 1 });
      body.assertValid();

      comment.comment = text;
      await comments.save(comment);
      const [view] = await commentViews([comment]);
      return success(res, view);
    })
  );

  router.delete(
    '/:id/comments/:commentId',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const { comment, caller } = await loadComment(req.params.id, req.params.commentId, user.id);
      if (comment.employeeId !== caller.id && !isPrivileged(user)) {
        throw forbidden("You don't have permission to delete this comment");
      }
      await comments.remove(comment);
      return success(res, { message: 'Comment deleted successfully' });
    })
  );

  return router;
}
