import { Router } from 'express';
import { Between, DataSource, In, IsNull, LessThanOrEqual, MoreThanOrEqual, Not } from 'typeorm';
import { Attendance, Employee, LeaveRequest, Project, ProjectMember, Task } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { attendanceRate, hoursWorked, isOnTime } from '../services/attendanceStats';
import {
  averageAttendanceRate,
  clockInsByHour,
  completionRateOf,
  dailyStatusSeries,
  dayLabel,
  hasUpcomingBirthday,
  histogram,
  hourLabels,
  personalSeries,
  punctualitySplit,
  workedHourSlots,
} from '../services/dashboardStats';
import { annualEntitlement } from '../services/leavePolicy';
import { employeeSummary, fullName } from '../services/views';
import { queryEnum } from '../validation/fields';
import { addDays, businessDays, eachDay, monthEnd, monthStart, round2, today, yearOf } from '../utils/dates';
import { success } from '../utils/responses';
import { LEAVE_STATUSES, PROJECT_STATUSES, TASK_PRIORITIES, TASK_STATUSES } from '../types';

const CHART_PERIODS = ['day', 'week', 'month'] as const;

function dashboardEmployee(e: Employee) {
  return { ...employeeSummary(e), dateOfJoining: e.dateOfJoining, dateOfBirth: e.dateOfBirth };
}

function dashboardProject(p: Project) {
  return { id: p.id, name: p.name, status: p.status, startDate: p.startDate, endDate: p.endDate };
}

const isOverdue = (t: Task, now: string) => t.dueDate !== null && t.dueDate < now && t.status !== 'completed';

export default function dashboardRouter(dataSource: DataSource, config: AppConfig) {
  const router = Router();
  const employees = dataSource.getRepository(Employee);
  const attendance = dataSource.getRepository(Attendance);
  const leaves = dataSource.getRepository(LeaveRequest);
  const projects = dataSource.getRepository(Project);
  const members = dataSource.getRepository(ProjectMember);
  const tasks = dataSource.getRepository(Task);
  const access = new AccessPolicy(dataSource);

  async function pendingLeaveItems(list: LeaveRequest[]) {
    const people = await access.employeesById(list.map(l => l.employeeId));
    return list.map(l => {
      const person = people.get(l.employeeId);
      return {
        id: l.id,
        employee: person ? fullName(person) : null,
        employeeId: l.employeeId,
        startDate: l.startDate,
        endDate: l.endDate,
        days: l.days,
        leaveType: l.leaveType,
        createdAt: l.createdAt,
      };
    });
  }

  function onLeave(now: string, employeeIds?: string[]) {
    return leaves.countBy({
      status: 'approved',
      startDate: LessThanOrEqual(now),
      endDate: MoreThanOrEqual(now),
      ...(employeeIds ? { employeeId: In(employeeIds) } : {}),
    });
  }

  async function adminDashboard() {
    const now = today();
    const [totalEmployees, todays, onLeaveToday, monthLeaves, allProjects, allTasks, recentJoins, withBirthday, pending] =
      await Promise.all([
        employees.count(),
        attendance.findBy({ date: now }),
        onLeave(now),
        leaves.findBy({ startDate: MoreThanOrEqual(monthStart(now)) }),
        projects.find(),
        tasks.find(),
        employees.find({ order: { dateOfJoining: 'DESC' }, take: 5 }),
        employees.find({ where: { dateOfBirth: Not(IsNull()) } }),
        leaves.find({ where: { status: 'pending' }, order: { createdAt: 'DESC' }, take: 10 }),
      ]);

    const projectStats = histogram(PROJECT_STATUSES, allProjects.map(p => p.status));
    const taskStats = histogram(TASK_STATUSES, allTasks.map(t => t.status));
    const leaveStats = histogram(LEAVE_STATUSES, monthLeaves.map(l => l.status));
    const birthdays = withBirthday
      .filter(e => hasUpcomingBirthday(e.dateOfBirth, now))
      .sort((a, b) => (a.dateOfBirth ?? '').slice(8).localeCompare((b.dateOfBirth ?? '').slice(8)))
      .slice(0, 5);
    const weekAhead = addDays(now, 7);
    const deadlines = allProjects
      .filter(p => p.endDate !== null && p.endDate >= now && p.endDate <= weekAhead)
      .sort((a, b) => (a.endDate ?? '').localeCompare(b.endDate ?? ''))
      .slice(0, 5);

    return {
      overview: {
        totalEmployees,
        presentToday: todays.filter(a => a.status === 'present').length,
        absentToday: todays.filter(a => a.status === 'absent').length,
        onLeaveToday,
        pendingLeaves: leaveStats.pending,
        activeProjects: projectStats.in_progress,
        completedTasks: taskStats.completed,
        overdueTasks: allTasks.filter(t => isOverdue(t, now)).length,
      },
      employees: {
        recentJoins: recentJoins.map(dashboardEmployee),
        upcomingBirthdays: birthdays.map(dashboardEmployee),
      },
      projects: { upcomingDeadlines: deadlines.map(dashboardProject), byStatus: projectStats },
      tasks: { byStatus: taskStats },
      leaves: { byStatus: leaveStats, pendingRequests: await pendingLeaveItems(pending) },
    };
  }

  async function managerDashboard(manager: Employee) {
    const now = today();
    const team = await employees.find({ where: { managerId: manager.id }, order: { lastName: 'ASC' } });
    const teamIds = [...team.map(e => e.id), manager.id];
    const memberships = await members.find({ where: { employeeId: manager.id }, select: { projectId: true } });
    const projectIds = memberships.map(m => m.projectId);

    const [presentToday, onLeaveToday, pendingTasks, teamTasks, pending, active] = await Promise.all([
      attendance.countBy({ date: now, status: 'present', employeeId: In(teamIds) }),
      onLeave(now, teamIds),
      tasks.countBy({ projectId: In(projectIds), status: Not('completed') }),
      tasks.findBy({ assigneeId: In(teamIds) }),
      leaves.find({ where: { employeeId: In(teamIds), status: 'pending' }, order: { createdAt: 'DESC' } }),
      projects.find({ where: { id: In(projectIds) }, order: { endDate: 'ASC' }, take: 5 }),
    ]);
    const taskStats = histogram(TASK_STATUSES, teamTasks.map(t => t.status));

    return {
      overview: {
        teamSize: team.length,
        presentToday,
        onLeaveToday,
        pendingTasks,
        teamTaskCompletionRate: completionRateOf(taskStats),
        pendingLeaveRequests: pending.length,
      },
      team: { members: team.map(dashboardEmployee) },
      tasks: { byStatus: taskStats, total: teamTasks.length },
      projects: { active: active.map(dashboardProject) },
      leaves: { pendingRequests: await pendingLeaveItems(pending) },
    };
  }

  async function employeeDashboard(employee: Employee) {
    const now = today();
    const start = monthStart(now);
    const [todayRecord, month, requests, myTasks, projectIds] = await Promise.all([
      attendance.findOneBy({ employeeId: employee.id, date: now }),
      attendance.findBy({ employeeId: employee.id, date: Between(start, now) }),
      leaves.find({ where: { employeeId: employee.id }, order: { createdAt: 'DESC' } }),
      tasks.findBy({ assigneeId: employee.id }),
      access.projectIdsFor(employee.id),
    ]);
    const myProjects = await projects.findBy({ id: In(projectIds) });
    const projectName = new Map(myProjects.map(p => [p.id, p.name]));

    const presentDays = month.filter(a => a.status === 'present').length;
    const absentDays = month.filter(a => a.status === 'absent').length;
    const halfDays = month.filter(a => a.status === 'half-day').length;
    const workingDays = businessDays(start, now);
    const entitled = annualEntitlement(employee.dateOfJoining, now);
    const taken = round2(
      requests
        .filter(l => l.leaveType === 'annual' && l.status === 'approved' && yearOf(l.startDate) === yearOf(now))
        .reduce((acc, l) => acc + l.days, 0)
    );
    const weekAhead = addDays(now, 7);
    const upcoming = myTasks
      .filter(t => t.status !== 'completed' && t.dueDate !== null && t.dueDate >= now && t.dueDate <= weekAhead)
      .sort((a, b) => (a.dueDate ?? '').localeCompare(b.dueDate ?? ''));

    return {
      attendance: {
        today: {
          status: todayRecord?.status ?? 'not_recorded',
          clockIn: todayRecord?.clockIn ?? null,
          clockOut: todayRecord?.clockOut ?? null,
          hoursWorked: todayRecord ? hoursWorked(todayRecord) : 0,
        },
        monthly: {
          presentDays,
          absentDays,
          halfDays,
          notRecorded: Math.max(0, workingDays - presentDays - absentDays - halfDays),
          attendanceRate: attendanceRate(presentDays, halfDays, workingDays),
        },
      },
      leaves: {
        balance: { annual: { entitled, taken, remaining: round2(entitled - taken) } },
        recentRequests: requests.slice(0, 5).map(l => ({
          id: l.id,
          startDate: l.startDate,
          endDate: l.endDate,
          days: l.days,
          leaveType: l.leaveType,
          status: l.status,
          createdAt: l.createdAt,
        })),
      },
      tasks: {
        byStatus: histogram(TASK_STATUSES, myTasks.map(t => t.status)),
        total: myTasks.length,
        upcomingDeadlines: upcoming.map(t => ({
          id: t.id,
          title: t.title,
          projectName: projectName.get(t.projectId) ?? null,
          priority: t.priority,
          dueDate: t.dueDate,
          progress: t.progress,
        })),
      },
      projects: {
        count: myProjects.length,
        list: myProjects.map(p => ({
          id: p.id,
          name: p.name,
          status: p.status,
          myTasksCount: myTasks.filter(t => t.projectId === p.id).length,
        })),
      },
    };
  }

  router.use(authRequired(config.jwtSecret));

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      if (isPrivileged(user)) return success(res, await adminDashboard());
      const employee = await access.requireEmployee(user.id);
      if (user.role === 'manager') return success(res, await managerDashboard(employee));
      return success(res, await employeeDashboard(employee));
    })
  );

  router.get(
    '/attendance',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const period = queryEnum(req.query, 'period', CHART_PERIODS, 'period') ?? 'day';
      const now = today();
      const dates = period === 'week' ? eachDay(addDays(now, -6), now) : eachDay(monthStart(now), monthEnd(now));

      if (isPrivileged(user)) {
        if (period === 'day') {
          const [records, headcount] = await Promise.all([attendance.findBy({ date: now }), employees.count()]);
          const { onTime, late } = punctualitySplit(records);
          return success(res, {
            period,
            labels: hourLabels(),
            datasets: [{ name: 'Clock-ins', data: clockInsByHour(records) }],
            summary: { totalAttendance: records.length, onTime, late, absent: Math.max(0, headcount - onTime - late) },
          });
        }
        const records = await attendance.findBy({ date: Between(dates[0], dates[dates.length - 1]) });
        const datasets = dailyStatusSeries(records, dates);
        return success(res, {
          period,
          labels: dates.map(d => dayLabel(d, period)),
          datasets,
          summary: {
            totalWorkingDays: dates.length,
            avgAttendanceRate: averageAttendanceRate(datasets[0].data, datasets[1].data, datasets[2].data),
          },
        });
      }

      const employee = await access.requireEmployee(user.id);
      if (period === 'day') {
        const record = await attendance.findOneBy({ employeeId: employee.id, date: now });
        return success(res, {
          period,
          labels: hourLabels(),
          datasets: [{ name: 'Hours Worked', data: workedHourSlots(record?.clockIn ?? null, record?.clockOut ?? null) }],
          summary: {
            status: record?.status ?? 'not_recorded',
            clockIn: record?.clockIn ?? null,
            clockOut: record?.clockOut ?? null,
            hoursWorked: record ? hoursWorked(record) : 0,
            onTime: isOnTime(record?.clockIn ?? null),
          },
        });
      }
      const records = await attendance.findBy({
        employeeId: employee.id,
        date: Between(dates[0], dates[dates.length - 1]),
      });
      return success(res, { period, labels: dates.map(d => dayLabel(d, period)), ...personalSeries(records, dates) });
    })
  );

  router.get(
    '/projects',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const list = isPrivileged(user)
        ? await projects.find()
        : await projects.findBy({ id: In(await access.projectIdsFor(employee.id)) });
      const ids = list.map(p => p.id);
      const [projectTasks, projectMembers] = await Promise.all([
        tasks.find({ where: { projectId: In(ids) }, select: { projectId: true, status: true } }),
        members.find({ where: { projectId: In(ids) }, select: { projectId: true } }),
      ]);

      const rows = list
        .map(p => {
          const own = projectTasks.filter(t => t.projectId === p.id);
          return {
            ...dashboardProject(p),
            taskCount: own.length,
            completionRate: completionRateOf(histogram(TASK_STATUSES, own.map(t => t.status))),
            membersCount: projectMembers.filter(m => m.projectId === p.id).length,
          };
        })
        .sort((a, b) => (a.endDate ?? '9999-12-31').localeCompare(b.endDate ?? '9999-12-31'));

      return success(res, {
        byStatus: histogram(PROJECT_STATUSES, list.map(p => p.status)),
        total: list.length,
        projects: rows.slice(0, 10),
      });
    })
  );

  router.get(
    '/tasks',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const employee = await access.requireEmployee(user.id);
      const now = today();

      if (isPrivileged(user)) {
        const all = await tasks.find();
        const byStatus = histogram(TASK_STATUSES, all.map(t => t.status));
        const weekAgo = addDays(now, -7);
        return success(res, {
          byPriority: histogram(TASK_PRIORITIES, all.map(t => t.priority)),
          byStatus,
          total: all.length,
          overdue: all.filter(t => isOverdue(t, now)).length,
          recentlyCompleted: all.filter(t => t.status === 'completed' && (t.completedAt ?? '') >= weekAgo).length,
          completionRate: completionRateOf(byStatus),
        });
      }

      const mine = await tasks.findBy({ assigneeId: employee.id });
      const byStatus = histogram(TASK_STATUSES, mine.map(t => t.status));
      const weekAhead = addDays(now, 7);
      const upcoming = mine
        .filter(t => t.status !== 'completed' && t.dueDate !== null && t.dueDate >= now && t.dueDate <= weekAhead)
        .sort((a, b) => (a.dueDate ?? '').localeCompare(b.dueDate ?? ''));
      const names = new Map(
        (await projects.findBy({ id: In([...new Set(upcoming.map(t => t.projectId))]) })).map(p => [p.id, p.name])
      );

      return success(res, {
        byPriority: histogram(TASK_PRIORITIES, mine.map(t => t.priority)),
        byStatus,
        total: mine.length,
        overdue: mine.filter(t => isOverdue(t, now)).length,
        completionRate: completionRateOf(byStatus),
        upcomingDeadlines: upcoming.map(t => ({
          id: t.id,
          title: t.title,
          projectId: t.projectId,
          projectName: names.get(t.projectId) ?? null,
          priority: t.priority,
          dueDate: t.dueDate,
          progress: t.progress,
        })),
      });
    })
  );

  return router;
}
