import { Attendance, Department, Employee, LeaveRequest, Payroll, Project, Task } from '../entities';
import { attendanceRate, hoursWorked } from './attendanceStats';
import { completionRateOf, histogram } from './dashboardStats';
import { fullName } from './views';
import { CsvColumn } from '../utils/csv';
import { isoDate, round2 } from '../utils/dates';
import { Histogram, TASK_PRIORITIES, TASK_STATUSES } from '../types';

export const REPORT_FORMATS = ['json', 'csv'] as const;

/** Employees (soft-deleted included) and departments a report row may mention. */
export type Directory = {
  employees: Map<string, Employee>;
  departments: Map<string, Department>;
};

export type PersonInfo = { employeeCode: string; name: string; department: string };

export function personInfo(dir: Directory, employeeId: string): PersonInfo {
  const e = dir.employees.get(employeeId);
  if (!e) return { employeeCode: '', name: 'Unknown', department: 'N/A' };
  const department = e.departmentId ? dir.departments.get(e.departmentId) : undefined;
  return { employeeCode: e.employeeCode, name: fullName(e), department: department?.name ?? 'N/A' };
}

/** Orders rows by the employee's last then first name, then by `tieBreak`. */
export function sortByPerson<T>(rows: T[], dir: Directory, idOf: (row: T) => string, tieBreak: (row: T) => string): T[] {
  const key = (row: T) => {
    const e = dir.employees.get(idOf(row));
    return [e?.lastName ?? '', e?.firstName ?? '', tieBreak(row)];
  };
  return [...rows].sort((a, b) => {
    const [ka, kb] = [key(a), key(b)];
    for (let i = 0; i < ka.length; i++) {
      if (ka[i] !== kb[i]) return ka[i] < kb[i] ? -1 : 1;
    }
    return 0;
  });
}

function groupBy<T, V>(rows: T[], keyOf: (row: T) => string, init: () => V, add: (acc: V, row: T) => void) {
  const out: Record<string, V> = {};
  for (const row of rows) {
    const key = keyOf(row);
    add((out[key] ??= init()), row);
  }
  return out;
}

function sum<T>(rows: T[], valueOf: (row: T) => number): number {
  return round2(rows.reduce((acc, row) => acc + valueOf(row), 0));
}

// Attendance

export type AttendanceRow = PersonInfo & Pick<Attendance, 'date' | 'status' | 'clockIn' | 'clockOut' | 'workFrom'> & {
  hoursWorked: number;
};

export type AttendanceSummaryRow = PersonInfo & {
  daysPresent: number;
  daysAbsent: number;
  halfDays: number;
  totalHours: number;
  workFromOffice: number;
  workFromHome: number;
  workRemote: number;
  attendanceRate: number;
};

export function attendanceRows(records: Attendance[], dir: Directory): AttendanceRow[] {
  return sortByPerson(records, dir, r => r.employeeId, r => r.date).map(r => ({
    ...personInfo(dir, r.employeeId),
    date: r.date,
    status: r.status,
    clockIn: r.clockIn,
    clockOut: r.clockOut,
    hoursWorked: hoursWorked(r),
    workFrom: r.workFrom,
  }));
}

/** One line per employee; the rate is over recorded days only. */
export function summariseAttendance(rows: AttendanceRow[]): AttendanceSummaryRow[] {
  const groups = groupBy(
    rows,
    r => r.employeeCode,
    (): AttendanceRow[] => [],
    (acc, r) => acc.push(r)
  );
  return Object.values(groups).map(group => {
    const count = (pick: (r: AttendanceRow) => boolean) => group.filter(pick).length;
    const present = count(r => r.status === 'present');
    const absent = count(r => r.status === 'absent');
    const half = count(r => r.status === 'half-day');
    const { employeeCode, name, department } = group[0];
    return {
      employeeCode,
      name,
      department,
      daysPresent: present,
      daysAbsent: absent,
      halfDays: half,
      totalHours: sum(group, r => r.hoursWorked),
      workFromOffice: count(r => r.workFrom === 'office'),
      workFromHome: count(r => r.workFrom === 'home'),
      workRemote: count(r => r.workFrom === 'remote'),
      attendanceRate: attendanceRate(present, half, present + absent + half),
    };
  });
}

export const ATTENDANCE_DAILY_COLUMNS: CsvColumn<AttendanceRow>[] = [
  { header: 'Employee ID', value: r => r.employeeCode },
  { header: 'Name', value: r => r.name },
  { header: 'Department', value: r => r.department },
  { header: 'Date', value: r => r.date },
  { header: 'Status', value: r => r.status },
  { header: 'Clock In', value: r => r.clockIn },
  { header: 'Clock Out', value: r => r.clockOut },
  { header: 'Hours Worked', value: r => r.hoursWorked },
  { header: 'Work From', value: r => r.workFrom },
];

export const ATTENDANCE_SUMMARY_COLUMNS: CsvColumn<AttendanceSummaryRow>[] = [
  { header: 'Employee ID', value: r => r.employeeCode },
  { header: 'Name', value: r => r.name },
  { header: 'Department', value: r => r.department },
  { header: 'Days Present', value: r => r.daysPresent },
  { header: 'Days Absent', value: r => r.daysAbsent },
  { header: 'Half Days', value: r => r.halfDays },
  { header: 'Total Hours', value: r => r.totalHours },
  { header: 'Work From Office', value: r => r.workFromOffice },
  { header: 'Work From Home', value: r => r.workFromHome },
  { header: 'Work Remote', value: r => r.workRemote },
  { header: 'Attendance Rate (%)', value: r => r.attendanceRate },
];

// Leave

export type LeaveRow = PersonInfo &
  Pick<LeaveRequest, 'leaveType' | 'startDate' | 'endDate' | 'days' | 'status' | 'reason'> & {
    leaveId: string;
    createdAt: string;
  };

type CountAndDays = { count: number; days: number };

export type LeaveSummary = {
  totalRequests: number;
  totalDays: number;
  byType: Record<string, CountAndDays>;
  byStatus: Record<string, CountAndDays>;
};

export function leaveRows(requests: LeaveRequest[], dir: Directory): LeaveRow[] {
  return sortByPerson(requests, dir, l => l.employeeId, l => l.startDate).map(l => ({
    ...personInfo(dir, l.employeeId),
    leaveId: l.id,
    leaveType: l.leaveType,
    startDate: l.startDate,
    endDate: l.endDate,
    days: l.days,
    status: l.status,
    reason: l.reason,
    createdAt: l.createdAt.toISOString(),
  }));
}

export function summariseLeave(rows: LeaveRow[]): LeaveSummary {
  const tally = (keyOf: (r: LeaveRow) => string) =>
    groupBy(
      rows,
      keyOf,
      (): CountAndDays => ({ count: 0, days: 0 }),
      (acc, r) => {
        acc.count += 1;
        acc.days = round2(acc.days + r.days);
      }
    );
  return {
    totalRequests: rows.length,
    totalDays: sum(rows, r => r.days),
    byType: tally(r => r.leaveType),
    byStatus: tally(r => r.status),
  };
}

export const LEAVE_COLUMNS: CsvColumn<LeaveRow>[] = [
  { header: 'Employee ID', value: r => r.employeeCode },
  { header: 'Name', value: r => r.name },
  { header: 'Department', value: r => r.department },
  { header: 'Leave ID', value: r => r.leaveId },
  { header: 'Leave Type', value: r => r.leaveType },
  { header: 'Start Date', value: r => r.startDate },
  { header: 'End Date', value: r => r.endDate },
  { header: 'Days', value: r => r.days },
  { header: 'Status', value: r => r.status },
  { header: 'Reason', value: r => r.reason },
  { header: 'Created At', value: r => r.createdAt },
];

// Payroll

export type PayrollRow = PersonInfo &
  Pick<
    Payroll,
    | 'periodStart'
    | 'periodEnd'
    | 'baseSalary'
    | 'overtimeHours'
    | 'overtimeAmount'
    | 'bonus'
    | 'deductions'
    | 'tax'
    | 'netAmount'
    | 'status'
    | 'paymentDate'
  > & { payrollId: string };

type CountAndAmount = { count: number; amount: number };

export type PayrollSummary = {
  totalPayrolls: number;
  totalBaseSalary: number;
  totalOvertime: number;
  totalBonus: number;
  totalDeductions: number;
  totalTax: number;
  totalNetAmount: number;
  byDepartment: Record<string, CountAndAmount>;
  byStatus: Record<string, CountAndAmount>;
};

export function payrollRows(payrolls: Payroll[], dir: Directory): PayrollRow[] {
  return sortByPerson(payrolls, dir, p => p.employeeId, p => p.periodEnd).map(p => ({
    ...personInfo(dir, p.employeeId),
    payrollId: p.id,
    periodStart: p.periodStart,
    periodEnd: p.periodEnd,
    baseSalary: p.baseSalary,
    overtimeHours: p.overtimeHours,
    overtimeAmount: p.overtimeAmount,
    bonus: p.bonus,
    deductions: p.deductions,
    tax: p.tax,
    netAmount: p.netAmount,
    status: p.status,
    paymentDate: p.paymentDate,
  }));
}

export function summarisePayroll(rows: PayrollRow[]): PayrollSummary {
  const tally = (keyOf: (r: PayrollRow) => string) =>
    groupBy(
      rows,
      keyOf,
      (): CountAndAmount => ({ count: 0, amount: 0 }),
      (acc, r) => {
        acc.count += 1;
        acc.amount = round2(acc.amount + r.netAmount);
      }
    );
  return {
    totalPayrolls: rows.length,
    totalBaseSalary: sum(rows, r => r.baseSalary),
    totalOvertime: sum(rows, r => r.overtimeAmount),
    totalBonus: sum(rows, r => r.bonus),
    totalDeductions: sum(rows, r => r.deductions),
    totalTax: sum(rows, r => r.tax),
    totalNetAmount: sum(rows, r => r.netAmount),
    byDepartment: tally(r => r.department),
    byStatus: tally(r => r.status),
  };
}

export const PAYROLL_COLUMNS: CsvColumn<PayrollRow>[] = [
  { header: 'Employee ID', value: r => r.employeeCode },
  { header: 'Name', value: r => r.name },
  { header: 'Department', value: r => r.department },
  { header: 'Payroll ID', value: r => r.payrollId },
  { header: 'Period Start', value: r => r.periodStart },
  { header: 'Period End', value: r => r.periodEnd },
  { header: 'Base Salary', value: r => r.baseSalary },
  { header: 'Overtime Hours', value: r => r.overtimeHours },
  { header: 'Overtime Amount', value: r => r.overtimeAmount },
  { header: 'Bonus', value: r => r.bonus },
  { header: 'Deductions', value: r => r.deductions },
  { header: 'Tax', value: r => r.tax },
  { header: 'Net Amount', value: r => r.netAmount },
  { header: 'Status', value: r => r.status },
  { header: 'Payment Date', value: r => r.paymentDate },
];

// Projects and tasks

/** Open-ended project dates count as unbounded on that side. */
export function projectOverlaps(p: Pick<Project, 'startDate' | 'endDate'>, start: string, end: string): boolean {
  return (p.startDate === null || p.startDate <= end) && (p.endDate === null || p.endDate >= start);
}

/** Created, completed or due inside the range. */
export function taskTouches(t: Pick<Task, 'createdAt' | 'completedAt' | 'dueDate'>, start: string, end: string): boolean {
  const within = (d: string | null) => d !== null && d >= start && d <= end;
  return within(isoDate(t.createdAt)) || within(t.completedAt?.slice(0, 10) ?? null) || within(t.dueDate);
}

export type ProjectRow = Pick<Project, 'name' | 'description' | 'status' | 'startDate' | 'endDate' | 'budget'> & {
  projectId: string;
  manager: string;
  taskCount: number;
  completedTasks: number;
  completionRate: number;
};

export type ProjectSummary = {
  totalProjects: number;
  averageCompletionRate: number;
  byStatus: Record<string, { count: number; averageCompletion: number }>;
};

/** Latest end date first; open-ended projects lead. */
export function projectRows(projects: Project[], tasks: Pick<Task, 'projectId' | 'status'>[], dir: Directory): ProjectRow[] {
  const ordered = [...projects].sort((a, b) => {
    if (a.endDate === b.endDate) return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    if (a.endDate === null) return -1;
    if (b.endDate === null) return 1;
    return a.endDate < b.endDate ? 1 : -1;
  });
  return ordered.map(p => {
    const statuses = tasks.filter(t => t.projectId === p.id).map(t => t.status);
    const creator = dir.employees.get(p.createdBy);
    return {
      projectId: p.id,
      name: p.name,
      description: p.description,
      status: p.status,
      startDate: p.startDate,
      endDate: p.endDate,
      budget: p.budget,
      manager: creator ? fullName(creator) : 'Unknown',
      taskCount: statuses.length,
      completedTasks: statuses.filter(s => s === 'completed').length,
      completionRate: completionRateOf(histogram(TASK_STATUSES, statuses)),
    };
  });
}

export function summariseProjects(rows: ProjectRow[]): ProjectSummary {
  const groups = groupBy(
    rows,
    r => r.status,
    (): ProjectRow[] => [],
    (acc, r) => acc.push(r)
  );
  const byStatus: ProjectSummary['byStatus'] = {};
  for (const [status, group] of Object.entries(groups)) {
    byStatus[status] = { count: group.length, averageCompletion: round2(sum(group, r => r.completionRate) / group.length) };
  }
  return {
    totalProjects: rows.length,
    averageCompletionRate: rows.length ? round2(sum(rows, r => r.completionRate) / rows.length) : 0,
    byStatus,
  };
}

export const PROJECT_COLUMNS: CsvColumn<ProjectRow>[] = [
  { header: 'Project ID', value: r => r.projectId },
  { header: 'Name', value: r => r.name },
  { header: 'Description', value: r => r.description },
  { header: 'Status', value: r => r.status },
  { header: 'Start Date', value: r => r.startDate },
  { header: 'End Date', value: r => r.endDate },
  { header: 'Budget', value: r => r.budget },
  { header: 'Manager', value: r => r.manager },
  { header: 'Task Count', value: r => r.taskCount },
  { header: 'Completed Tasks', value: r => r.completedTasks },
  { header: 'Completion Rate (%)', value: r => r.completionRate },
];

export type TaskRow = Pick<Task, 'title' | 'status' | 'priority' | 'progress' | 'dueDate' | 'completedAt' | 'projectId'> & {
  taskId: string;
  createdAt: string;
  projectName: string;
  assignee: string;
  assigneeCode: string | null;
};

export type TaskSummary = {
  totalTasks: number;
  completedTasks: number;
  overdueTasks: number;
  byStatus: Histogram;
  byPriority: Histogram;
  byAssignee: Record<string, { total: number; completed: number; completionRate: number }>;
};

/** Soonest due date first; undated tasks last. */
export function taskRows(tasks: Task[], projects: Map<string, Project>, dir: Directory): TaskRow[] {
  const ordered = [...tasks].sort((a, b) => {
    if (a.dueDate === b.dueDate) return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
    if (a.dueDate === null) return 1;
    if (b.dueDate === null) return -1;
    return a.dueDate < b.dueDate ? -1 : 1;
  });
  return ordered.map(t => {
    const assignee = t.assigneeId ? dir.employees.get(t.assigneeId) : undefined;
    return {
      taskId: t.id,
      title: t.title,
      status: t.status,
      priority: t.priority,
      progress: t.progress,
      dueDate: t.dueDate,
      createdAt: t.createdAt.toISOString(),
      completedAt: t.completedAt,
      projectId: t.projectId,
      projectName: projects.get(t.projectId)?.name ?? '',
      assignee: assignee ? fullName(assignee) : 'Unassigned',
      assigneeCode: assignee?.employeeCode ?? null,
    };
  });
}

export function summariseTasks(rows: TaskRow[], asOf: string): TaskSummary {
  const groups = groupBy(
    rows,
    r => r.assignee,
    (): TaskRow[] => [],
    (acc, r) => acc.push(r)
  );
  const byAssignee: TaskSummary['byAssignee'] = {};
  for (const [name, group] of Object.entries(groups)) {
    const done = group.filter(r => r.status === 'completed').length;
    byAssignee[name] = { total: group.length, completed: done, completionRate: round2((done / group.length) * 100) };
  }
  return {
    totalTasks: rows.length,
    completedTasks: rows.filter(r => r.status === 'completed').length,
    overdueTasks: rows.filter(r => r.status !== 'completed' && r.dueDate !== null && r.dueDate < asOf).length,
    byStatus: histogram(TASK_STATUSES, rows.map(r => r.status)),
    byPriority: histogram(TASK_PRIORITIES, rows.map(r => r.priority)),
    byAssignee,
  };
}

export const TASK_COLUMNS: CsvColumn<TaskRow>[] = [
  { header: 'Task ID', value: r => r.taskId },
  { header: 'Title', value: r => r.title },
  { header: 'Status', value: r => r.status },
  { header: 'Priority', value: r => r.priority },
  { header: 'Progress', value: r => r.progress },
  { header: 'Due Date', value: r => r.dueDate },
  { header: 'Created At', value: r => r.createdAt },
  { header: 'Completed At', value: r => r.completedAt },
  { header: 'Project ID', value: r => r.projectId },
  { header: 'Project Name', value: r => r.projectName },
  { header: 'Assignee', value: r => r.assignee },
];
