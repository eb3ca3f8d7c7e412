import { Router } from 'express';
import { DataSource, FindOptionsWhere, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee, KeyResult, Objective } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { personRef } from '../services/views';
import { FieldReader, isRecord, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { today } from '../utils/dates';
import { AuthUser, OBJECTIVE_STATUSES, OBJECTIVE_TIMEFRAMES } from '../types';

/** Whole percent of the target reached, capped at 100. */
export function keyResultProgress(currentValue: number, targetValue: number): number {
  if (targetValue <= 0) return 0;
  return Math.min(100, Math.floor((currentValue / targetValue) * 100));
}

/** Integer mean of the key results' progress. */
export function objectiveProgress(keyResults: Pick<KeyResult, 'progress'>[]): number {
  if (keyResults.length === 0) return 0;
  return Math.floor(keyResults.reduce((sum, kr) => sum + kr.progress, 0) / keyResults.length);
}

type DraftKeyResult = { title: string; description: string; targetValue: number; unit: string };

export default function okrRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(Objective);
  const keyResults = dataSource.getRepository(KeyResult);
  const access = new AccessPolicy(dataSource);

  async function present(list: Objective[]) {
    if (list.length === 0) return [];
    const [results, people] = await Promise.all([
      keyResults.find({ where: { objectiveId: In(list.map(o => o.id)) }, order: { position: 'ASC' } }),
      access.employeesById(list.flatMap(o => [o.employeeId, o.createdBy])),
    ]);
    return list.map(o => ({
      ...o,
      employee: personRef(people.get(o.employeeId)),
      creator: personRef(people.get(o.createdBy)),
      keyResults: results.filter(kr => kr.objectiveId === o.id),
    }));
  }

  async function presentOne(objective: Objective) {
    const [view] = await present([objective]);
    return view;
  }

  async function loadObjective(id: string): Promise<Objective> {
    const objective = await repo.findOneBy({ id });
    if (!objective) throw notFound('OKR not found');
    return objective;
  }

  /** Admin/HR reach everyone, managers themselves and their reports, others only themselves. */
  async function canReach(user: AuthUser, own: Employee | null, employeeId: string): Promise<boolean> {
    if (isPrivileged(user)) return true;
    if (!own) return false;
    if (own.id === employeeId) return true;
    if (user.role !== 'manager') return false;
    return access.isDirectReport(own.id, employeeId);
  }

  async function assertReach(user: AuthUser, objective: Objective, verb: string) {
    const own = await access.employeeForUser(user.id);
    if (!(await canReach(user, own, objective.employeeId))) {
      throw forbidden(
        user.role === 'manager'
          ? `You can only ${verb} your own or your team members' OKRs`
          : `You can only ${verb} your own OKRs`
      );
    }
  }

  function readKeyResults(body: FieldReader): DraftKeyResult[] {
    const drafts: DraftKeyResult[] = [];
    (body.optionalList('keyResults') ?? []).forEach((raw, i) => {
      const entry = new FieldReader(raw);
      const title = entry.requireString('title', { min: 1, max: 200 });
      const description = entry.optionalString('description') ?? '';
      const targetValue = entry.requireNumber('targetValue');
      const unit = entry.optionalString('unit', { max: 30 }) ?? '';
      entry.check(!entry.has('targetValue') || targetValue > 0, 'targetValue', 'Target value must be greater than 0');
      if (!isRecord(raw) || !entry.valid) body.fail('keyResults', `Entry ${i} is not a valid key result.`);
      else drafts.push({ title, description, targetValue, unit });
    });
    return drafts;
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const requested = queryString(req.query, 'employeeId');
      const status = queryEnum(req.query, 'status', OBJECTIVE_STATUSES, 'status');
      const timeframe = queryEnum(req.query, 'timeframe', OBJECTIVE_TIMEFRAMES, 'timeframe');
      const page = pageRequest(req.query, config);

      const where: FindOptionsWhere<Objective> = {};
      if (isPrivileged(user)) {
        if (requested) where.employeeId = requested;
      } else {
        const own = await access.requireEmployee(user.id);
        if (requested) {
          if (!(await canReach(user, own, requested))) {
            throw forbidden(
              user.role === 'manager'
                ? "You can only view your own or your team members' OKRs"
                : 'You can only view your own OKRs'
            );
          }
          where.employeeId = requested;
        } else if (user.role === 'manager') {
          where.employeeId = In([own.id, ...(await access.directReportIds(own.id))]);
        } else {
          where.employeeId = own.id;
        }
      }
      if (status) where.status = status;
      if (timeframe) where.timeframe = timeframe;

      const [items, total] = await repo.findAndCount({
        where,
        order: { createdAt: 'DESC', title: 'ASC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.get(
    '/mine',
    asyncRoute(async (req, res) => {
      const own = await access.requireEmployee(currentUser(req).id);
      const status = queryEnum(req.query, 'status', OBJECTIVE_STATUSES, 'status');
      const page = pageRequest(req.query, config);
      const where: FindOptionsWhere<Objective> = { employeeId: own.id };
      if (status) where.status = status;

      const [items, total] = await repo.findAndCount({
        where,
        order: { createdAt: 'DESC', title: 'ASC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.put(
    '/key-results/:id',
    asyncRoute(async (req, res) => {
      const keyResult = await keyResults.findOneBy({ id: req.params.id });
      if (!keyResult) throw notFound('Key result not found');
      const objective = await loadObjective(keyResult.objectiveId);
      const user = currentUser(req);
      const own = await access.employeeForUser(user.id);
      if (!(await canReach(user, own, objective.employeeId))) {
        throw forbidden(
          user.role === 'manager'
            ? "You can only update your own or your team members' key results"
            : 'You can only update your own key results'
        );
      }
      if (objective.status === 'completed') throw badRequest('Cannot update key results in a completed OKR');

      const body = new FieldReader(req.body);
      const title = body.optionalString('title', { min: 1, max: 200 });
      const description = body.optionalString('description');
      const targetValue = body.optionalNumber('targetValue');
      const currentValue = body.optionalNumber('currentValue', { min: 0 });
      const unit = body.optionalString('unit', { max: 30 });
      if (targetValue !== undefined) body.check(targetValue > 0, 'targetValue', 'Target value must be greater than 0');
      body.assertValid();

      if (title !== undefined) keyResult.title = title;
      if (description !== undefined) keyResult.description = description;
      if (unit !== undefined) keyResult.unit = unit;
      if (targetValue !== undefined) keyResult.targetValue = targetValue;
      if (currentValue !== undefined) keyResult.currentValue = currentValue;
      keyResult.progress = keyResultProgress(keyResult.currentValue, keyResult.targetValue);

      await dataSource.transaction(async manager => {
        await manager.save(keyResult);
        const siblings = await manager.findBy(KeyResult, { objectiveId: objective.id });
        objective.progress = objectiveProgress(siblings);
        await manager.save(objective);
      });
      return success(res, await presentOne(objective));
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const objective = await loadObjective(req.params.id);
      await assertReach(currentUser(req), objective, 'view');
      return success(res, await presentOne(objective));
    })
  );

  router.post(
    '/',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const creator = await access.requireEmployee(user.id);
      const body = new FieldReader(req.body);
      const employeeId = body.requireId('employeeId');
      const title = body.requireString('title', { min: 1, max: 200 });
      const description = body.optionalString('description') ?? '';
      const timeframe = body.optionalEnum('timeframe', OBJECTIVE_TIMEFRAMES) ?? 'quarterly';
      const startDate = body.requireDate('startDate', { notPast: today() });
      const endDate = body.requireDate('endDate');
      const status = body.optionalEnum('status', ['draft', 'active'] as const) ?? 'draft';
      const drafts = readKeyResults(body);
      if (body.has('startDate') && body.has('endDate')) {
        body.check(endDate >= startDate, 'endDate', 'End date must be on or after start date.');
      }
      body.assertValid();

      if (!(await dataSource.getRepository(Employee).existsBy({ id: employeeId }))) {
        throw notFound('Target employee not found');
      }
      if (!(await canReach(user, creator, employeeId))) {
        throw forbidden('You can only create OKRs for yourself or your team members');
      }

      const objective = await dataSource.transaction(async manager => {
        const record = manager.create(Objective, {
          id: uuidv4(),
          employeeId,
          title,
          description,
          timeframe,
          startDate,
          endDate,
          status,
          progress: 0,
          createdBy: creator.id,
        });
        await manager.save(record);
        await manager.save(
          drafts.map((kr, position) =>
            manager.create(KeyResult, {
              ...kr,
              id: uuidv4(),
              objectiveId: record.id,
              currentValue: 0,
              position,
              progress: 0,
            })
          )
        );
        return record;
      });
      return created(res, await presentOne(objective));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const objective = await loadObjective(req.params.id);
      await assertReach(currentUser(req), objective, 'update');
      if (objective.status === 'completed') throw badRequest('Cannot update a completed OKR');

      const body = new FieldReader(req.body);
      const title = body.optionalString('title', { min: 1, max: 200 });
      const description = body.optionalString('description');
      const timeframe = body.optionalEnum('timeframe', OBJECTIVE_TIMEFRAMES);
      const startDate = body.optionalDate('startDate', { notPast: today() });
      const endDate = body.optionalDate('endDate');
      const progress = body.optionalNumber('progress', { min: 0, max: 100, integer: true });
      const nextStart = startDate ?? objective.startDate;
      const nextEnd = endDate ?? objective.endDate;
      body.check(nextEnd >= nextStart, 'endDate', 'End date must be on or after start date.');
      body.assertValid();

      if (title !== undefined) objective.title = title;
      if (description !== undefined) objective.description = description;
      if (timeframe !== undefined) objective.timeframe = timeframe;
      if (progress !== undefined) objective.progress = progress;
      objective.startDate = nextStart;
      objective.endDate = nextEnd;
      await repo.save(objective);
      return success(res, await presentOne(objective));
    })
  );

  router.post(
    '/:id/activate',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const objective = await loadObjective(req.params.id);
      await assertReach(currentUser(req), objective, 'activate');
      if (objective.status !== 'draft') throw badRequest('Only draft OKRs can be activated');
      objective.status = 'active';
      await repo.save(objective);
      return success(res, await presentOne(objective));
    })
  );

  router.post(
    '/:id/complete',
    asyncRoute(async (req, res) => {
      const objective = await loadObjective(req.params.id);
      await assertReach(currentUser(req), objective, 'complete');
      if (objective.status !== 'active') throw badRequest('Only active OKRs can be completed');
      objective.status = 'completed';
      await repo.save(objective);
      return success(res, await presentOne(objective));
    })
  );

  router.post(
    '/:id/cancel',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const objective = await loadObjective(req.params.id);
      await assertReach(currentUser(req), objective, 'cancel');
      if (objective.status === 'completed') throw badRequest('Cannot cancel a completed OKR');
      if (objective.status === 'cancelled') throw badRequest('OKR is already cancelled');
      objective.status = 'cancelled';
      await repo.save(objective);
      return success(res, await presentOne(objective));
    })
  );

  return router;
}
