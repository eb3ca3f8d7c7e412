import { v4 as uuidv4 } from 'uuid';
import { Attendance, Department, LeaveRequest, Payroll, Project, Task } from '../src/entities';
import { Account, bearer, createTestContext, TestContext } from './helpers/testApp';

const MARCH = 'startDate=2025-03-01&endDate=2025-03-31';

describe('/api/reports', () => {
  let ctx: TestContext;
  let hr: Account;
  let lead: Account;
  let ada: Account;
  let zed: Account;
  let engineering: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    const departments = ctx.dataSource.getRepository(Department);
    engineering = uuidv4();
    await departments.save(departments.create({ id: engineering, name: 'Engineering', description: null }));

    hr = await ctx.account('hr', { firstName: 'Hana', lastName: 'Ross' });
    lead = await ctx.account('manager', { firstName: 'Lea', lastName: 'Lead', departmentId: engineering });
    ada = await ctx.account('employee', {
      firstName: 'Ada',
      lastName: 'Byron',
      employeeCode: 'E100',
      managerId: lead.employee.id,
      departmentId: engineering,
    });
    zed = await ctx.account('employee', { firstName: 'Zed', lastName: 'Adams', employeeCode: 'E200' });
  });

  afterEach(() => ctx.close());

  function report(who: Account, path: string) {
    return ctx.http.get(`/api/reports/${path}`).set(...bearer(who));
  }

  describe('GET /attendance', () => {
    beforeEach(async () => {
      const repo = ctx.dataSource.getRepository(Attendance);
      const day = (employee: Account, fields: Partial<Attendance>) =>
        repo.create({ id: uuidv4(), employeeId: employee.employee.id, notes: null, ...fields });
      await repo.save([
        day(ada, {
          date: '2025-03-03',
          clockIn: '2025-03-03T09:00:00.000Z',
          clockOut: '2025-03-03T17:30:00.000Z',
          status: 'present',
          workFrom: 'office',
        }),
        day(ada, {
          date: '2025-03-04',
          clockIn: '2025-03-04T09:00:00.000Z',
          clockOut: '2025-03-04T13:00:00.000Z',
          status: 'half-day',
          workFrom: 'home',
        }),
        day(zed, { date: '2025-03-03', clockIn: null, clockOut: null, status: 'absent', workFrom: 'remote' }),
        day(zed, { date: '2025-04-01', clockIn: null, clockOut: null, status: 'absent', workFrom: 'office' }),
      ]);
    });

    it('lists daily records ordered by name then date', async () => {
      const res = await report(hr, `attendance?${MARCH}`);

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        startDate: '2025-03-01',
        endDate: '2025-03-31',
        reportType: 'daily',
        totalRecords: 3,
      });
      expect(res.body.data.records[0]).toEqual({
        employeeCode: 'E200',
        name: 'Zed Adams',
        department: 'N/A',
        date: '2025-03-03',
        status: 'absent',
        clockIn: null,
        clockOut: null,
        hoursWorked: 0,
        workFrom: 'remote',
      });
      expect(res.body.data.records.slice(1).map((r: { date: string; hoursWorked: number }) => [r.date, r.hoursWorked])).toEqual([
        ['2025-03-03', 8.5],
        ['2025-03-04', 4],
      ]);
    });

    it('summarises per employee and downloads as csv', async () => {
      const json = await report(hr, `attendance?${MARCH}&reportType=summary`);
      expect(json.body.data.records).toEqual([
        {
          employeeCode: 'E200',
          name: 'Zed Adams',
          department: 'N/A',
          daysPresent: 0,
          daysAbsent: 1,
          halfDays: 0,
          totalHours: 0,
          workFromOffice: 0,
          workFromHome: 0,
          workRemote: 1,
          attendanceRate: 0,
        },
        {
          employeeCode: 'E100',
          name: 'Ada Byron',
          department: 'Engineering',
          daysPresent: 1,
          daysAbsent: 0,
          halfDays: 1,
          totalHours: 12.5,
          workFromOffice: 1,
          workFromHome: 1,
          workRemote: 0,
          attendanceRate: 75,
        },
      ]);

      const csv = await report(hr, `attendance?${MARCH}&reportType=summary&format=csv`);
      expect(csv.status).toBe(200);
      expect(csv.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(csv.headers['content-disposition']).toBe(
        'attachment; filename=attendance_report_summary_2025-03-01_2025-03-31.csv'
      );
      expect(csv.text.split('\r\n')).toEqual([
        'Employee ID,Name,Department,Days Present,Days Absent,Half Days,Total Hours,Work From Office,Work From Home,Work Remote,Attendance Rate (%)',
        'E200,Zed Adams,N/A,0,1,0,0,0,0,1,0',
        'E100,Ada Byron,Engineering,1,0,1,12.5,1,1,0,75',
        '',
      ]);
    });

    it('scopes managers to their team and filters by department', async () => {
      const team = await report(lead, `attendance?${MARCH}`);
      expect(team.body.data.records.map((r: { employeeCode: string }) => r.employeeCode)).toEqual(['E100', 'E100']);

      const outside = await report(lead, `attendance?${MARCH}&employeeId=${zed.employee.id}`);
      expect(outside.status).toBe(403);
      expect(outside.body.error).toBe('You can only report on yourself and your direct reports');

      const department = await report(hr, `attendance?${MARCH}&departmentId=${engineering}`);
      expect(department.body.data.totalRecords).toBe(2);

      const employee = await report(ada, `attendance?${MARCH}`);
      expect(employee.status).toBe(403);
      expect(employee.body.error).toBe('Permission denied. Required roles: admin, hr, manager');
    });

    it('rejects bad ranges and formats', async () => {
      const inverted = await report(hr, 'attendance?startDate=2025-03-31&endDate=2025-03-01');
      expect(inverted.status).toBe(400);
      expect(inverted.body.error).toBe('Start date must be before end date');

      const long = await report(hr, 'attendance?startDate=2024-01-01&endDate=2025-12-31');
      expect(long.status).toBe(400);
      expect(long.body.error).toBe('Report range cannot exceed 366 days');

      const xml = await report(hr, `attendance?${MARCH}&format=xml`);
      expect(xml.status).toBe(400);
      expect(xml.body.error).toBe('Invalid format: xml');
    });
  });

  describe('GET /leave', () => {
    beforeEach(async () => {
      const repo = ctx.dataSource.getRepository(LeaveRequest);
      const leave = (employee: Account, fields: Partial<LeaveRequest>) =>
        repo.create({
          id: uuidv4(),
          employeeId: employee.employee.id,
          reviewedBy: null,
          reviewedAt: null,
          reviewNote: null,
          ...fields,
        });
      await repo.save([
        leave(ada, {
          leaveType: 'annual',
          startDate: '2025-03-10',
          endDate: '2025-03-12',
          days: 3,
          status: 'approved',
          reason: 'Trip, family',
        }),
        leave(zed, {
          leaveType: 'sick',
          startDate: '2025-02-27',
          endDate: '2025-03-03',
          days: 3,
          status: 'pending',
          reason: null,
        }),
        leave(zed, {
          leaveType: 'annual',
          startDate: '2025-05-01',
          endDate: '2025-05-02',
          days: 2,
          status: 'pending',
          reason: null,
        }),
      ]);
    });

    it('includes requests overlapping the range with a summary', async () => {
      const res = await report(hr, `leave?${MARCH}`);

      expect(res.status).toBe(200);
      expect(res.body.data.totalRecords).toBe(2);
      expect(res.body.data.summary).toEqual({
        totalRequests: 2,
        totalDays: 6,
        byType: { annual: { count: 1, days: 3 }, sick: { count: 1, days: 3 } },
        byStatus: { approved: { count: 1, days: 3 }, pending: { count: 1, days: 3 } },
      });

      const sick = await report(hr, `leave?${MARCH}&leaveType=sick`);
      expect(sick.body.data.records.map((r: { name: string }) => r.name)).toEqual(['Zed Adams']);
    });

    it('quotes free text in the csv download', async () => {
      const [zedRow, adaRow] = (await report(hr, `leave?${MARCH}`)).body.data.records;
      const csv = await report(hr, `leave?${MARCH}&format=csv`);

      expect(csv.headers['content-disposition']).toBe('attachment; filename=leave_report_2025-03-01_2025-03-31.csv');
      expect(csv.text.split('\r\n')).toEqual([
        'Employee ID,Name,Department,Leave ID,Leave Type,Start Date,End Date,Days,Status,Reason,Created At',
        `E200,Zed Adams,N/A,${zedRow.leaveId},sick,2025-02-27,2025-03-03,3,pending,,${zedRow.createdAt}`,
        `E100,Ada Byron,Engineering,${adaRow.leaveId},annual,2025-03-10,2025-03-12,3,approved,"Trip, family",${adaRow.createdAt}`,
        '',
      ]);
    });
  });

  describe('GET /payroll', () => {
    beforeEach(async () => {
      const repo = ctx.dataSource.getRepository(Payroll);
      const payroll = (employee: Account, fields: Partial<Payroll>) =>
        repo.create({
          id: uuidv4(),
          employeeId: employee.employee.id,
          periodStart: '2025-03-01',
          periodEnd: '2025-03-31',
          overtimeHours: 0,
          overtimeAmount: 0,
          bonus: 0,
          deductions: 0,
          tax: 0,
          paymentDate: null,
          createdBy: hr.employee.id,
          ...fields,
        });
      await repo.save([
        payroll(ada, {
          baseSalary: 5000,
          overtimeAmount: 250.5,
          bonus: 300,
          deductions: 100,
          tax: 900.25,
          netAmount: 4550.25,
          status: 'paid',
          paymentDate: '2025-04-01',
        }),
        payroll(zed, { baseSalary: 4000, tax: 800, netAmount: 3200, status: 'draft' }),
      ]);
    });

    it('totals amounts by department and status', async () => {
      const res = await report(hr, `payroll?${MARCH}`);

      expect(res.status).toBe(200);
      expect(res.body.data.summary).toEqual({
        totalPayrolls: 2,
        totalBaseSalary: 9000,
        totalOvertime: 250.5,
        totalBonus: 300,
        totalDeductions: 100,
        totalTax: 1700.25,
        totalNetAmount: 7750.25,
        byDepartment: { Engineering: { count: 1, amount: 4550.25 }, 'N/A': { count: 1, amount: 3200 } },
        byStatus: { paid: { count: 1, amount: 4550.25 }, draft: { count: 1, amount: 3200 } },
      });

      const paid = await report(hr, `payroll?${MARCH}&status=paid`);
      expect(paid.body.data.records).toHaveLength(1);
      expect(paid.body.data.records[0]).toMatchObject({ employeeCode: 'E100', netAmount: 4550.25, paymentDate: '2025-04-01' });
    });

    it('is closed to managers and writes a csv header', async () => {
      const manager = await report(lead, `payroll?${MARCH}`);
      expect(manager.status).toBe(403);
      expect(manager.body.error).toBe('Permission denied. Required roles: admin, hr');

      const csv = await report(hr, `payroll?${MARCH}&format=csv&status=draft`);
      const lines = csv.text.split('\r\n');
      expect(lines[0]).toBe(
        'Employee ID,Name,Department,Payroll ID,Period Start,Period End,Base Salary,Overtime Hours,Overtime Amount,Bonus,Deductions,Tax,Net Amount,Status,Payment Date'
      );
      expect(lines).toHaveLength(3);
      expect(lines[1].endsWith(',2025-03-01,2025-03-31,4000,0,0,0,0,800,3200,draft,')).toBe(true);
    });
  });

  describe('GET /projects', () => {
    let apollo: string;
    let borealis: string;

    beforeEach(async () => {
      const projects = ctx.dataSource.getRepository(Project);
      apollo = uuidv4();
      borealis = uuidv4();
      const project = (fields: Partial<Project>) => projects.create({ description: null, budget: null, ...fields });
      await projects.save([
        project({
          id: apollo,
          name: 'Apollo',
          status: 'in_progress',
          startDate: '2025-01-01',
          endDate: '2025-06-30',
          budget: 10000,
          createdBy: lead.employee.id,
        }),
        project({ id: borealis, name: 'Borealis', status: 'planning', startDate: '2025-02-01', endDate: null, createdBy: hr.employee.id }),
        project({ id: uuidv4(), name: 'Comet', status: 'completed', startDate: '2024-01-01', endDate: '2024-12-31', createdBy: hr.employee.id }),
      ]);

      const tasks = ctx.dataSource.getRepository(Task);
      const task = (fields: Partial<Task>) =>
        tasks.create({
          id: uuidv4(),
          projectId: apollo,
          description: null,
          createdBy: lead.employee.id,
          progress: 0,
          estimatedHours: null,
          completedAt: null,
          ...fields,
        });
      await tasks.save([
        task({
          title: 'Design',
          status: 'completed',
          priority: 'high',
          assigneeId: ada.employee.id,
          dueDate: '2025-03-07',
          completedAt: '2025-03-05T10:00:00.000Z',
          progress: 100,
        }),
        task({ title: 'Build', status: 'in_progress', priority: 'medium', assigneeId: ada.employee.id, dueDate: '2025-03-20' }),
        task({ title: 'Docs', status: 'todo', priority: 'low', assigneeId: null, dueDate: null }),
        task({
          title: 'Review',
          status: 'completed',
          priority: 'low',
          assigneeId: null,
          dueDate: '2025-02-14',
          completedAt: '2025-02-10T10:00:00.000Z',
          progress: 100,
        }),
      ]);
    });

    it('reports projects active in the range, open-ended first', async () => {
      const res = await report(hr, `projects?${MARCH}`);

      expect(res.status).toBe(200);
      expect(res.body.data.records).toEqual([
        {
          projectId: borealis,
          name: 'Borealis',
          description: null,
          status: 'planning',
          startDate: '2025-02-01',
          endDate: null,
          budget: null,
          manager: 'Hana Ross',
          taskCount: 0,
          completedTasks: 0,
          completionRate: 0,
        },
        {
          projectId: apollo,
          name: 'Apollo',
          description: null,
          status: 'in_progress',
          startDate: '2025-01-01',
          endDate: '2025-06-30',
          budget: 10000,
          manager: 'Lea Lead',
          taskCount: 4,
          completedTasks: 2,
          completionRate: 50,
        },
      ]);
      expect(res.body.data.summary).toEqual({
        totalProjects: 2,
        averageCompletionRate: 25,
        byStatus: {
          planning: { count: 1, averageCompletion: 0 },
          in_progress: { count: 1, averageCompletion: 50 },
        },
      });
    });

    it('reports tasks created, completed or due in the range', async () => {
      const res = await report(hr, `projects?${MARCH}&reportType=tasks`);

      expect(res.body.data.records.map((r: { title: string }) => r.title)).toEqual(['Design', 'Build']);
      expect(res.body.data.records[1]).toMatchObject({
        projectName: 'Apollo',
        assignee: 'Ada Byron',
        assigneeCode: 'E100',
        dueDate: '2025-03-20',
      });
      expect(res.body.data.summary).toMatchObject({
        totalTasks: 2,
        completedTasks: 1,
        overdueTasks: 1,
        byAssignee: { 'Ada Byron': { total: 2, completed: 1, completionRate: 50 } },
      });
      expect(res.body.data.summary.byPriority).toEqual({ low: 0, medium: 1, high: 1, urgent: 0 });

      const csv = await report(hr, `projects?${MARCH}&reportType=tasks&format=csv`);
      expect(csv.headers['content-disposition']).toBe('attachment; filename=task_report_2025-03-01_2025-03-31.csv');
      expect(csv.text.split('\r\n')[0]).toBe(
        'Task ID,Title,Status,Priority,Progress,Due Date,Created At,Completed At,Project ID,Project Name,Assignee'
      );
    });

    it('limits managers to their own projects', async () => {
      const mine = await report(lead, `projects?${MARCH}`);
      expect(mine.body.data.records.map((r: { name: string }) => r.name)).toEqual(['Apollo']);

      const foreign = await report(lead, `projects?${MARCH}&projectId=${borealis}`);
      expect(foreign.status).toBe(403);
      expect(foreign.body.error).toBe("You don't have access to this project");

      const badStatus = await report(hr, `projects?${MARCH}&status=done`);
      expect(badStatus.status).toBe(400);
      expect(badStatus.body.error).toBe('Invalid status: done');
    });
  });
});
