import { Router } from 'express';
import { DataSource, FindOptionsWhere, In, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee, LeaveRequest } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { BLOCKING_STATUSES, computeBalance, defaultLeaveDays, findOverlap } from '../services/leavePolicy';
import { personRef } from '../services/views';
import { FieldReader, queryDate, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { exceedsMaxRange, MAX_RANGE_DAYS, nowIso, today } from '../utils/dates';
import { LEAVE_STATUSES, LEAVE_TYPES } from '../types';

const ACTIONS = ['approve', 'reject'] as const;

export default function leaveRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(LeaveRequest);
  const employees = dataSource.getRepository(Employee);
  const access = new AccessPolicy(dataSource);

  async function present(list: LeaveRequest[]) {
    const people = await access.employeesById(list.flatMap(l => [l.employeeId, l.reviewedBy]));
    return list.map(l => ({
      ...l,
      employee: personRef(people.get(l.employeeId)),
      reviewer: l.reviewedBy ? personRef(people.get(l.reviewedBy)) : null,
    }));
  }

  async function presentOne(l: LeaveRequest) {
    const [view] = await present([l]);
    return view;
  }

  async function assertNoOverlap(employeeId: string, startDate: string, endDate: string, excludeId?: string) {
    const existing = await repo.findBy({ employeeId, status: In(BLOCKING_STATUSES) });
    if (findOverlap(existing, startDate, endDate, excludeId)) {
      throw badRequest('You already have a leave request for this period');
    }
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/balance',
    asyncRoute(async (req, res) => {
      const employeeId = await access.resolveEmployeeScope(
        currentUser(req),
        queryString(req.query, 'employeeId'),
        'leave balance'
      );
      const employee = await employees.findOneBy({ id: employeeId });
      if (!employee) throw notFound('Employee not found');
      const requests = await repo.findBy({ employeeId, status: In(BLOCKING_STATUSES) });
      return success(res, computeBalance(employee, requests));
    })
  );

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const requested = queryString(req.query, 'employeeId');
      const status = queryEnum(req.query, 'status', LEAVE_STATUSES, 'status');
      const startDate = queryDate(req.query, 'startDate');
      const endDate = queryDate(req.query, 'endDate');
      const page = pageRequest(req.query, config);

      const where: FindOptionsWhere<LeaveRequest> = {};
      if (requested || !isPrivileged(user)) {
        if (requested || user.role !== 'manager') {
          where.employeeId = await access.resolveEmployeeScope(user, requested, 'leave requests');
        } else {
          const own = await access.requireEmployee(user.id, 'Manager profile not found');
          where.employeeId = In([own.id, ...(await access.directReportIds(own.id))]);
        }
      }
      if (status) where.status = status;
      // requests that touch the [startDate, endDate] window
      if (startDate) where.endDate = MoreThanOrEqual(startDate);
      if (endDate) where.startDate = LessThanOrEqual(endDate);

      const [items, total] = await repo.findAndCount({
        where,
        order: { createdAt: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await present(items), total, page));
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const leave = await repo.findOneBy({ id: req.params.id });
      if (!leave) throw notFound('Leave request not found');
      const owner = await employees.findOne({ where: { id: leave.employeeId }, withDeleted: true });
      if (!owner || !(await access.canSeeEmployee(currentUser(req), owner))) {
        throw forbidden("You don't have permission to view this leave request");
      }
      return success(res, await presentOne(leave));
    })
  );

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id);
      const body = new FieldReader(req.body);
      const leaveType = body.requireEnum('leaveType', LEAVE_TYPES);
      const startDate = body.requireDate('startDate');
      const endDate = body.requireDate('endDate');
      const requestedDays = body.optionalNumber('days', { min: 0.5 });
      const reason = body.nullableString('reason') ?? null;
      body.assertValid();

      if (startDate > endDate) throw badRequest('Start date must be before end date');
      if (startDate < today()) throw badRequest('Cannot request leave for past dates');
      if (exceedsMaxRange(startDate, endDate)) {
        throw badRequest(`Leave period cannot exceed ${MAX_RANGE_DAYS} days`);
      }
      const days = requestedDays ?? defaultLeaveDays(startDate, endDate);
      if (days <= 0) throw badRequest('Leave period contains no working days');
      await assertNoOverlap(employee.id, startDate, endDate);

      const leave = repo.create({
        id: uuidv4(),
        employeeId: employee.id,
        leaveType,
        startDate,
        endDate,
        days,
        reason,
        status: 'pending',
        reviewedBy: null,
        reviewedAt: null,
        reviewNote: null,
      });
      await repo.save(leave);
      return created(res, await presentOne(leave));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const leave = await repo.findOneBy({ id: req.params.id });
      if (!leave) throw notFound('Leave request not found');
      if (leave.status !== 'pending') throw badRequest('Only pending leave requests can be updated');
      const employee = await access.employeeForUser(currentUser(req).id);
      if (!employee || leave.employeeId !== employee.id) {
        throw forbidden("You don't have permission to update this leave request");
      }

      const body = new FieldReader(req.body);
      const leaveType = body.optionalEnum('leaveType', LEAVE_TYPES);
      const newStart = body.optionalDate('startDate');
      const newEnd = body.optionalDate('endDate');
      const days = body.optionalNumber('days', { min: 0.5 });
      const reason = body.nullableString('reason');
      body.assertValid();

      const startDate = newStart ?? leave.startDate;
      const endDate = newEnd ?? leave.endDate;
      if (startDate > endDate) throw badRequest('Start date must be before end date');
      if (startDate < today()) throw badRequest('Cannot request leave for past dates');
      if (exceedsMaxRange(startDate, endDate)) {
        throw badRequest(`Leave period cannot exceed ${MAX_RANGE_DAYS} days`);
      }

      const datesChanged = newStart !== undefined || newEnd !== undefined;
      if (datesChanged) {
        leave.days = days ?? defaultLeaveDays(startDate, endDate);
        if (leave.days <= 0) throw badRequest('Leave period contains no working days');
        await assertNoOverlap(employee.id, startDate, endDate, leave.id);
      } else if (days !== undefined) {
        leave.days = days;
      }
      leave.startDate = startDate;
      leave.endDate = endDate;
      if (leaveType !== undefined) leave.leaveType = leaveType;
      if (reason !== undefined) leave.reason = reason;
      await repo.save(leave);
      return success(res, await presentOne(leave));
    })
  );

  router.post(
    '/:id/cancel',
    asyncRoute(async (req, res) => {
      const leave = await repo.findOneBy({ id: req.params.id });
      if (!leave) throw notFound('Leave request not found');
      const employee = await access.employeeForUser(currentUser(req).id);
      if (!employee || leave.employeeId !== employee.id) {
        throw forbidden("You don't have permission to cancel this leave request");
      }
      if (leave.status === 'rejected' || leave.status === 'cancelled') {
        throw badRequest(`Leave request is already ${leave.status}`);
      }
      if (leave.status === 'approved' && leave.startDate < today()) {
        throw badRequest('Cannot cancel past approved leaves');
      }

      leave.status = 'cancelled';
      await repo.save(leave);
      return success(res, { message: 'Leave request cancelled successfully', leaveRequest: await presentOne(leave) });
    })
  );

  router.post(
    '/:id/action',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const leave = await repo.findOneBy({ id: req.params.id });
      if (!leave) throw notFound('Leave request not found');
      if (leave.status !== 'pending') throw badRequest(`Leave request is already ${leave.status}`);

      const body = new FieldReader(req.body);
      const action = body.requireEnum('action', ACTIONS);
      const note = body.nullableString('note') ?? null;
      body.assertValid();

      const reviewer = await access.requireEmployee(user.id, 'Reviewer profile not found');
      const allowed =
        isPrivileged(user) ||
        (user.role === 'manager' && (await access.isDirectReport(reviewer.id, leave.employeeId)));
      if (!allowed) throw forbidden("You don't have permission to approve/reject this leave request");

      leave.status = action === 'approve' ? 'approved' : 'rejected';
      leave.reviewedBy = reviewer.id;
      leave.reviewedAt = nowIso();
      leave.reviewNote = note;
      await repo.save(leave);
      return success(res, { message: `Leave request ${action}d successfully`, leaveRequest: await presentOne(leave) });
    })
  );

  return router;
}
