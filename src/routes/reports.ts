import { Response, Router } from 'express';
import { Between, DataSource, FindOptionsWhere, In, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { Attendance, Department, Employee, LeaveRequest, Payroll, Project, Task } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import {
  ATTENDANCE_DAILY_COLUMNS,
  ATTENDANCE_SUMMARY_COLUMNS,
  attendanceRows,
  Directory,
  LEAVE_COLUMNS,
  leaveRows,
  PAYROLL_COLUMNS,
  payrollRows,
  PROJECT_COLUMNS,
  projectOverlaps,
  projectRows,
  REPORT_FORMATS,
  summariseAttendance,
  summariseLeave,
  summarisePayroll,
  summariseProjects,
  summariseTasks,
  TASK_COLUMNS,
  taskRows,
  taskTouches,
} from '../services/reports';
import { queryDate, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden } from '../utils/errors';
import { success } from '../utils/responses';
import { CsvColumn, toCsv } from '../utils/csv';
import { addDays, exceedsMaxRange, MAX_RANGE_DAYS, monthStart, today } from '../utils/dates';
import {
  AuthUser,
  LEAVE_STATUSES,
  LEAVE_TYPES,
  PAYROLL_STATUSES,
  PROJECT_STATUSES,
  TASK_STATUSES,
} from '../types';

type Query = Record<string, unknown>;

const ATTENDANCE_REPORT_TYPES = ['daily', 'summary'] as const;
const PROJECT_REPORT_TYPES = ['projects', 'tasks'] as const;

function readRange(query: Query, defaultStart: (end: string) => string) {
  const endDate = queryDate(query, 'endDate') ?? today();
  const startDate = queryDate(query, 'startDate') ?? defaultStart(endDate);
  if (startDate > endDate) throw badRequest('Start date must be before end date');
  if (exceedsMaxRange(startDate, endDate)) throw badRequest(`Report range cannot exceed ${MAX_RANGE_DAYS} days`);
  return { startDate, endDate };
}

function sendCsv<T>(res: Response, filename: string, columns: CsvColumn<T>[], rows: T[]) {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename=${filename}`);
  return res.send(toCsv(columns, rows));
}

/**
 * Attendance, leave, payroll and project reports as JSON or CSV downloads.
 * Managers report on themselves and their direct reports, or on the
 * projects they created or belong to.
 */
export default function reportsRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const employees = dataSource.getRepository(Employee);
  const access = new AccessPolicy(dataSource);

  async function directory(employeeIds: (string | null)[]): Promise<Directory> {
    const [people, departments] = await Promise.all([
      access.employeesById(employeeIds),
      dataSource.getRepository(Department).find(),
    ]);
    return { employees: people, departments: new Map(departments.map(d => [d.id, d])) };
  }

  /** Employee ids the caller may report on, narrowed by `employeeId` / `departmentId`; undefined means everyone. */
  async function scopedEmployeeIds(user: AuthUser, query: Query): Promise<string[] | undefined> {
    const employeeId = queryString(query, 'employeeId');
    const departmentId = queryString(query, 'departmentId');
    let ids: string[] | undefined;
    if (!isPrivileged(user)) {
      const own = await access.requireEmployee(user.id);
      ids = [own.id, ...(await access.directReportIds(own.id))];
    }
    if (employeeId) {
      if (ids && !ids.includes(employeeId)) {
        throw forbidden('You can only report on yourself and your direct reports');
      }
      ids = [employeeId];
    }
    if (departmentId) {
      const members = await employees.find({ where: { departmentId }, select: { id: true }, withDeleted: true });
      const inDepartment = members.map(e => e.id);
      ids = ids ? ids.filter(id => inDepartment.includes(id)) : inDepartment;
    }
    return ids;
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/attendance',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const { startDate, endDate } = readRange(req.query, monthStart);
      const format = queryEnum(req.query, 'format', REPORT_FORMATS, 'format') ?? 'json';
      const reportType = queryEnum(req.query, 'reportType', ATTENDANCE_REPORT_TYPES, 'report type') ?? 'daily';
      const ids = await scopedEmployeeIds(currentUser(req), req.query);

      const where: FindOptionsWhere<Attendance> = { date: Between(startDate, endDate) };
      if (ids) where.employeeId = In(ids);
      const records = await dataSource.getRepository(Attendance).findBy(where);
      const daily = attendanceRows(records, await directory(records.map(r => r.employeeId)));

      const filename = `attendance_report_${reportType}_${startDate}_${endDate}.csv`;
      if (reportType === 'summary') {
        const rows = summariseAttendance(daily);
        if (format === 'csv') return sendCsv(res, filename, ATTENDANCE_SUMMARY_COLUMNS, rows);
        return success(res, { startDate, endDate, reportType, totalRecords: rows.length, records: rows });
      }
      if (format === 'csv') return sendCsv(res, filename, ATTENDANCE_DAILY_COLUMNS, daily);
      return success(res, { startDate, endDate, reportType, totalRecords: daily.length, records: daily });
    })
  );

  router.get(
    '/leave',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const { startDate, endDate } = readRange(req.query, end => `${end.slice(0, 4)}-01-01`);
      const format = queryEnum(req.query, 'format', REPORT_FORMATS, 'format') ?? 'json';
      const leaveType = queryEnum(req.query, 'leaveType', LEAVE_TYPES, 'leave type');
      const status = queryEnum(req.query, 'status', LEAVE_STATUSES, 'status');
      const ids = await scopedEmployeeIds(currentUser(req), req.query);

      const where: FindOptionsWhere<LeaveRequest> = {
        startDate: LessThanOrEqual(endDate),
        endDate: MoreThanOrEqual(startDate),
      };
      if (ids) where.employeeId = In(ids);
      if (leaveType) where.leaveType = leaveType;
      if (status) where.status = status;
      const requests = await dataSource.getRepository(LeaveRequest).findBy(where);
      const rows = leaveRows(requests, await directory(requests.map(l => l.employeeId)));

      if (format === 'csv') return sendCsv(res, `leave_report_${startDate}_${endDate}.csv`, LEAVE_COLUMNS, rows);
      return success(res, { startDate, endDate, totalRecords: rows.length, records: rows, summary: summariseLeave(rows) });
    })
  );

  router.get(
    '/payroll',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const { startDate, endDate } = readRange(req.query, monthStart);
      const format = queryEnum(req.query, 'format', REPORT_FORMATS, 'format') ?? 'json';
      const status = queryEnum(req.query, 'status', PAYROLL_STATUSES, 'status');
      const ids = await scopedEmployeeIds(currentUser(req), req.query);

      const where: FindOptionsWhere<Payroll> = {
        periodStart: LessThanOrEqual(endDate),
        periodEnd: MoreThanOrEqual(startDate),
      };
      if (ids) where.employeeId = In(ids);
      if (status) where.status = status;
      const payrolls = await dataSource.getRepository(Payroll).findBy(where);
      const rows = payrollRows(payrolls, await directory(payrolls.map(p => p.employeeId)));

      if (format === 'csv') return sendCsv(res, `payroll_report_${startDate}_${endDate}.csv`, PAYROLL_COLUMNS, rows);
      return success(res, {
        startDate,
        endDate,
        totalRecords: rows.length,
        records: rows,
        summary: summarisePayroll(rows),
      });
    })
  );

  router.get(
    '/projects',
    requireRole('admin', 'hr', 'manager'),
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const { startDate, endDate } = readRange(req.query, end => addDays(end, -90));
      const format = queryEnum(req.query, 'format', REPORT_FORMATS, 'format') ?? 'json';
      const reportType = queryEnum(req.query, 'reportType', PROJECT_REPORT_TYPES, 'report type') ?? 'projects';
      const projectId = queryString(req.query, 'projectId');

      let projectIds: string[] | undefined;
      if (!isPrivileged(user)) {
        const own = await access.requireEmployee(user.id);
        projectIds = await access.projectIdsFor(own.id);
      }
      if (projectId) {
        if (projectIds && !projectIds.includes(projectId)) throw forbidden("You don't have access to this project");
        projectIds = [projectId];
      }

      if (reportType === 'tasks') {
        const status = queryEnum(req.query, 'status', TASK_STATUSES, 'status');
        const assigneeId = queryString(req.query, 'employeeId');
        const where: FindOptionsWhere<Task> = {};
        if (projectIds) where.projectId = In(projectIds);
        if (assigneeId) where.assigneeId = assigneeId;
        if (status) where.status = status;
        const tasks = (await dataSource.getRepository(Task).findBy(where)).filter(t =>
          taskTouches(t, startDate, endDate)
        );
        const projects = await dataSource.getRepository(Project).findBy({ id: In(tasks.map(t => t.projectId)) });
        const rows = taskRows(
          tasks,
          new Map(projects.map(p => [p.id, p])),
          await directory(tasks.map(t => t.assigneeId))
        );

        if (format === 'csv') return sendCsv(res, `task_report_${startDate}_${endDate}.csv`, TASK_COLUMNS, rows);
        return success(res, {
          startDate,
          endDate,
          reportType,
          totalRecords: rows.length,
          records: rows,
          summary: summariseTasks(rows, today()),
        });
      }

      const status = queryEnum(req.query, 'status', PROJECT_STATUSES, 'status');
      const where: FindOptionsWhere<Project> = {};
      if (projectIds) where.id = In(projectIds);
      if (status) where.status = status;
      const projects = (await dataSource.getRepository(Project).findBy(where)).filter(p =>
        projectOverlaps(p, startDate, endDate)
      );
      const tasks = await dataSource.getRepository(Task).find({
        where: { projectId: In(projects.map(p => p.id)) },
        select: { projectId: true, status: true },
      });
      const rows = projectRows(projects, tasks, await directory(projects.map(p => p.createdBy)));

      if (format === 'csv') return sendCsv(res, `project_report_${startDate}_${endDate}.csv`, PROJECT_COLUMNS, rows);
      return success(res, {
        startDate,
        endDate,
        reportType,
        totalRecords: rows.length,
        records: rows,
        summary: summariseProjects(rows),
      });
    })
  );

  return router;
}
