import { Router } from 'express';
import { Between, DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Attendance, Employee } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy } from '../services/access';
import { buildAttendanceReport, hoursWorked } from '../services/attendanceStats';
import { FieldReader, queryDate, queryString } from '../validation/fields';
import { badRequest, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { addDays, exceedsMaxRange, MAX_RANGE_DAYS, monthStart, nowIso, today } from '../utils/dates';
import { ATTENDANCE_STATUSES, WORK_LOCATIONS } from '../types';

export function attendanceView(a: Attendance) {
  return { ...a, hoursWorked: hoursWorked(a) };
}

export default function attendanceRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const repo = dataSource.getRepository(Attendance);
  const access = new AccessPolicy(dataSource);

  router.use(authRequired(config.jwtSecret));

  router.post(
    '/clock-in',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id, 'Employee not found');
      const body = new FieldReader(req.body);
      const workFrom = body.optionalEnum('workFrom', WORK_LOCATIONS) ?? 'office';
      const notes = body.nullableString('notes') ?? null;
      body.assertValid();

      const date = today();
      let record = await repo.findOneBy({ employeeId: employee.id, date });
      if (record?.clockIn) throw badRequest('Already clocked in today');

      if (!record) {
        record = repo.create({ id: uuidv4(), employeeId: employee.id, date, status: 'present', clockOut: null });
      }
      record.clockIn = nowIso();
      record.workFrom = workFrom;
      record.notes = notes;
      await repo.save(record);
      return success(res, { message: 'Clock in successful', attendance: attendanceView(record) });
    })
  );

  router.post(
    '/clock-out',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id, 'Employee not found');
      const body = new FieldReader(req.body);
      const notes = body.optionalString('notes');
      body.assertValid();

      const record = await repo.findOneBy({ employeeId: employee.id, date: today() });
      if (!record || !record.clockIn) throw badRequest('Not yet clocked in today');
      if (record.clockOut) throw badRequest('Already clocked out today');

      record.clockOut = nowIso();
      if (notes) record.notes = record.notes ? `${record.notes}\n${notes}` : notes;
      await repo.save(record);
      return success(res, {
        message: 'Clock out successful',
        attendance: attendanceView(record),
        hoursWorked: hoursWorked(record),
      });
    })
  );

  router.get(
    '/status',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id, 'Employee not found');
      const record = await repo.findOneBy({ employeeId: employee.id, date: today() });
      if (!record || !record.clockIn) {
        return success(res, { status: 'not_started', attendance: record ? attendanceView(record) : null, hoursWorked: 0 });
      }
      return success(res, {
        status: record.clockOut ? 'completed' : 'in_progress',
        attendance: attendanceView(record),
        hoursWorked: hoursWorked(record),
      });
    })
  );

  router.get(
    '/history',
    asyncRoute(async (req, res) => {
      const employeeId = await access.resolveEmployeeScope(
        currentUser(req),
        queryString(req.query, 'employeeId'),
        'attendance'
      );
      const startDate = queryDate(req.query, 'startDate') ?? monthStart(today());
      const endDate = queryDate(req.query, 'endDate') ?? today();
      const page = pageRequest(req.query, config);

      const [items, total] = await repo.findAndCount({
        where: { employeeId, date: Between(startDate, endDate) },
        order: { date: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(items.map(attendanceView), total, page));
    })
  );

  router.get(
    '/report',
    asyncRoute(async (req, res) => {
      const employeeId = await access.resolveEmployeeScope(
        currentUser(req),
        queryString(req.query, 'employeeId'),
        'attendance'
      );
      const endDate = queryDate(req.query, 'endDate') ?? today();
      const startDate = queryDate(req.query, 'startDate') ?? addDays(endDate, -30);
      if (startDate > endDate) throw badRequest('Start date must be before end date');
      if (exceedsMaxRange(startDate, endDate)) {
        throw badRequest(`Report range cannot exceed ${MAX_RANGE_DAYS} days`);
      }

      const records = await repo.find({ where: { employeeId, date: Between(startDate, endDate) } });
      return success(res, buildAttendanceReport(records, startDate, endDate));
    })
  );

  router.post(
    '/record',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const employeeId = body.requireId('employeeId');
      const date = body.requireDate('date', { notFuture: today() });
      const status = body.requireEnum('status', ATTENDANCE_STATUSES);
      const clockIn = body.optionalInstant('clockIn') ?? null;
      const clockOut = body.optionalInstant('clockOut') ?? null;
      const workFrom = body.optionalEnum('workFrom', WORK_LOCATIONS) ?? 'office';
      const notes = body.nullableString('notes') ?? null;
      if (clockIn && clockOut) body.check(clockOut >= clockIn, 'clockOut', 'Clock-out cannot be before clock-in.');
      body.assertValid();

      if (!(await dataSource.getRepository(Employee).existsBy({ id: employeeId }))) {
        throw notFound('Employee not found');
      }
      if (await repo.existsBy({ employeeId, date })) {
        throw badRequest(`Attendance record already exists for ${date}`);
      }

      const record = repo.create({ id: uuidv4(), employeeId, date, status, clockIn, clockOut, workFrom, notes });
      await repo.save(record);
      return created(res, attendanceView(record));
    })
  );

  router.put(
    '/record/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const record = await repo.findOneBy({ id: req.params.id });
      if (!record) throw notFound('Attendance record not found');

      const body = new FieldReader(req.body);
      const status = body.optionalEnum('status', ATTENDANCE_STATUSES);
      const clockIn = body.optionalInstant('clockIn');
      const clockOut = body.optionalInstant('clockOut');
      const workFrom = body.optionalEnum('workFrom', WORK_LOCATIONS);
      const notes = body.nullableString('notes');
      const nextIn = clockIn ?? record.clockIn;
      const nextOut = clockOut ?? record.clockOut;
      if (nextIn && nextOut) body.check(nextOut >= nextIn, 'clockOut', 'Clock-out cannot be before clock-in.');
      body.assertValid();

      if (status !== undefined) record.status = status;
      if (workFrom !== undefined) record.workFrom = workFrom;
      if (notes !== undefined) record.notes = notes;
      record.clockIn = nextIn;
      record.clockOut = nextOut;
      await repo.save(record);
      return success(res, attendanceView(record));
    })
  );

  router.delete(
    '/record/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const record = await repo.findOneBy({ id: req.params.id });
      if (!record) throw notFound('Attendance record not found');
      await repo.remove(record);
      return success(res, { message: 'Attendance record deleted successfully' });
    })
  );

  return router;
}
