import { Router } from 'express';
import { DataSource, FindOptionsWhere, IsNull, MoreThanOrEqual } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Department, Employee, Payroll, Salary, User } from '../entities';
import { AppConfig } from '../config';
import { authRequired, currentUser, requireRole } from '../middleware/auth';
import { asyncRoute } from '../middleware/errors';
import { AccessPolicy, isPrivileged } from '../services/access';
import { Mailer } from '../services/mailer';
import { buildPayslip, DEFAULT_PAYSLIP_OPTIONS, PayslipOptions } from '../services/payslip';
import { personRef } from '../services/views';
import { renderPayslipPdf } from '../templates/payslipPdf';
import { FieldReader, isValidEmail, queryEnum, queryString } from '../validation/fields';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { pageRequest, toPage } from '../utils/pagination';
import { created, paginated, success } from '../utils/responses';
import { addDays, round2, today } from '../utils/dates';
import { AuthUser, PAY_FREQUENCIES, PAYROLL_STATUSES, SALARY_TYPES } from '../types';

type Amounts = Pick<Payroll, 'baseSalary' | 'overtimeAmount' | 'bonus' | 'deductions' | 'tax'>;

/** base + overtime + bonus - deductions - tax */
export function computeNetAmount(p: Amounts): number {
  return round2(p.baseSalary + p.overtimeAmount + p.bonus - p.deductions - p.tax);
}

export default function payrollRouter(dataSource: DataSource, config: AppConfig, mailer: Mailer) {
  const router = Router();
  const salaries = dataSource.getRepository(Salary);
  const payrolls = dataSource.getRepository(Payroll);
  const employees = dataSource.getRepository(Employee);
  const access = new AccessPolicy(dataSource);

  async function withPeople<T extends { employeeId: string; createdBy: string }>(list: T[]) {
    const people = await access.employeesById(list.flatMap(r => [r.employeeId, r.createdBy]));
    return list.map(r => ({
      ...r,
      employee: personRef(people.get(r.employeeId)),
      creator: personRef(people.get(r.createdBy)),
    }));
  }

  async function one<T extends { employeeId: string; createdBy: string }>(row: T) {
    const [view] = await withPeople([row]);
    return view;
  }

  async function requireTarget(employeeId: string): Promise<Employee> {
    const employee = await employees.findOneBy({ id: employeeId });
    if (!employee) throw notFound('Employee not found');
    return employee;
  }

  async function loadPayroll(id: string): Promise<Payroll> {
    const payroll = await payrolls.findOneBy({ id });
    if (!payroll) throw notFound('Payroll not found');
    return payroll;
  }

  /** Owners may read their own payroll; admin and HR read every one. */
  async function assertPayrollReader(payroll: Payroll, user: AuthUser, message: string) {
    if (isPrivileged(user)) return;
    const own = await access.employeeForUser(user.id);
    if (!own || own.id !== payroll.employeeId) throw forbidden(message);
  }

  async function payslipFor(payroll: Payroll, options: PayslipOptions = DEFAULT_PAYSLIP_OPTIONS) {
    const employee = await employees.findOne({ where: { id: payroll.employeeId }, withDeleted: true });
    if (!employee) throw notFound('Employee not found');
    const department = employee.departmentId
      ? await dataSource.getRepository(Department).findOneBy({ id: employee.departmentId })
      : null;
    return { payslip: buildPayslip(payroll, employee, department, options), employee };
  }

  async function renderPdf(payroll: Payroll) {
    const { payslip, employee } = await payslipFor(payroll);
    return { payslip, employee, pdf: await renderPayslipPdf(payslip, config.companyName) };
  }

  router.use(authRequired(config.jwtSecret));

  // Salaries

  router.get(
    '/salaries',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const employeeId = queryString(req.query, 'employeeId');
      const page = pageRequest(req.query, config);
      const [items, total] = await salaries.findAndCount({
        where: employeeId ? { employeeId } : {},
        order: { effectiveDate: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await withPeople(items), total, page));
    })
  );

  router.get(
    '/salaries/current',
    requireRole('admin', 'hr'),
    asyncRoute(async (_req, res) => {
      const now = today();
      const active = await salaries.find({
        where: [{ endDate: IsNull() }, { endDate: MoreThanOrEqual(now) }],
        order: { effectiveDate: 'DESC' },
      });
      // latest effective record per employee
      const latest = new Map<string, Salary>();
      for (const s of active) {
        if (s.effectiveDate <= now && !latest.has(s.employeeId)) latest.set(s.employeeId, s);
      }
      return success(res, await withPeople([...latest.values()]));
    })
  );

  router.get(
    '/salaries/:employeeId/history',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const employee = await requireTarget(req.params.employeeId);
      const list = await salaries.find({ where: { employeeId: employee.id }, order: { effectiveDate: 'DESC' } });
      return success(res, await withPeople(list));
    })
  );

  router.post(
    '/salaries',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const employeeId = body.requireId('employeeId');
      const baseSalary = body.requireNumber('baseSalary', { min: 0 });
      const salaryType = body.optionalEnum('salaryType', SALARY_TYPES) ?? 'fixed';
      const frequency = body.optionalEnum('frequency', PAY_FREQUENCIES) ?? 'monthly';
      const effectiveDate = body.requireDate('effectiveDate', { notPast: today() });
      const endDate = body.nullableDate('endDate') ?? null;
      if (endDate) body.check(endDate >= effectiveDate, 'endDate', 'End date must be on or after effective date.');
      body.assertValid();

      const creator = await access.requireEmployee(currentUser(req).id, 'Creator employee record not found');
      await requireTarget(employeeId);

      const salary = salaries.create({
        id: uuidv4(),
        employeeId,
        baseSalary,
        salaryType,
        frequency,
        effectiveDate,
        endDate,
        createdBy: creator.id,
      });
      await dataSource.transaction(async manager => {
        const open = await manager.findOneBy(Salary, { employeeId, endDate: IsNull() });
        if (open && open.effectiveDate < effectiveDate) {
          open.endDate = addDays(effectiveDate, -1);
          await manager.save(open);
        }
        await manager.save(salary);
      });
      return created(res, await one(salary));
    })
  );

  // Payrolls

  router.get(
    '/payrolls',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const where: FindOptionsWhere<Payroll> = {};
      const employeeId = queryString(req.query, 'employeeId');
      const status = queryEnum(req.query, 'status', PAYROLL_STATUSES, 'status');
      if (employeeId) where.employeeId = employeeId;
      if (status) where.status = status;
      const page = pageRequest(req.query, config);
      const [items, total] = await payrolls.findAndCount({
        where,
        order: { periodEnd: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await withPeople(items), total, page));
    })
  );

  router.post(
    '/payrolls/generate-payslip',
    asyncRoute(async (req, res) => {
      const user = currentUser(req);
      const body = new FieldReader(req.body);
      const payrollId = body.requireId('payrollId');
      const options: PayslipOptions = {
        includeBreakdown: body.optionalBoolean('includeBreakdown') ?? DEFAULT_PAYSLIP_OPTIONS.includeBreakdown,
        includeCompanyLogo: body.optionalBoolean('includeCompanyLogo') ?? DEFAULT_PAYSLIP_OPTIONS.includeCompanyLogo,
        includeSignature: body.optionalBoolean('includeSignature') ?? DEFAULT_PAYSLIP_OPTIONS.includeSignature,
      };
      body.assertValid();

      const payroll = await loadPayroll(payrollId);
      await assertPayrollReader(payroll, user, "You don't have permission to generate this payslip");
      const { payslip } = await payslipFor(payroll, options);
      return success(res, payslip);
    })
  );

  router.get(
    '/payrolls/:id',
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      await assertPayrollReader(payroll, currentUser(req), "You don't have permission to view this payroll");
      return success(res, await one(payroll));
    })
  );

  router.get(
    '/payrolls/:id/payslip.pdf',
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      await assertPayrollReader(payroll, currentUser(req), "You don't have permission to generate this payslip");
      const { pdf } = await renderPdf(payroll);
      res.setHeader('Content-Type', 'application/pdf');
      res.setHeader('Content-Disposition', `attachment; filename=payslip-${payroll.id}.pdf`);
      res.setHeader('Content-Length', pdf.length.toString());
      return res.end(pdf);
    })
  );

  router.post(
    '/payrolls/:id/email',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const to = body.optionalString('to');
      const subject = body.optionalString('subject', { min: 1 });
      const text = body.optionalString('text');
      if (to !== undefined) body.check(isValidEmail(to), 'to', 'Not a valid email address.');
      body.assertValid();

      const payroll = await loadPayroll(req.params.id);
      const { payslip, employee, pdf } = await renderPdf(payroll);

      if (mailer.state === 'disabled') {
        return success(res, { message: 'Email sending is disabled. PDF generated successfully.', pdfGenerated: true });
      }

      let recipient = to;
      if (!recipient) {
        const account = await dataSource.getRepository(User).findOneBy({ id: employee.userId });
        recipient = account?.email;
      }
      if (!recipient) throw badRequest('Recipient email is required');

      await mailer.send({
        to: recipient,
        subject: subject ?? `Payslip ${payslip.payroll.period}`,
        text: text ?? `Please find attached your payslip for ${payslip.payroll.period}.`,
        attachments: [{ filename: `payslip-${payroll.id}.pdf`, content: pdf }],
      });
      return success(res, { message: 'Email sent successfully', to: recipient });
    })
  );

  router.post(
    '/payrolls',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const body = new FieldReader(req.body);
      const employeeId = body.requireId('employeeId');
      const periodStart = body.requireDate('periodStart');
      const periodEnd = body.requireDate('periodEnd');
      const baseSalary = body.requireNumber('baseSalary', { min: 0 });
      const overtimeHours = body.optionalNumber('overtimeHours', { min: 0 }) ?? 0;
      const overtimeAmount = body.optionalNumber('overtimeAmount', { min: 0 }) ?? 0;
      const bonus = body.optionalNumber('bonus', { min: 0 }) ?? 0;
      const bonusDescription = body.optionalString('bonusDescription') ?? '';
      const deductions = body.optionalNumber('deductions', { min: 0 }) ?? 0;
      const deductionDescription = body.optionalString('deductionDescription') ?? '';
      const tax = body.optionalNumber('tax', { min: 0 }) ?? 0;
      const notes = body.optionalString('notes') ?? '';
      const netAmount =
        body.optionalNumber('netAmount') ?? computeNetAmount({ baseSalary, overtimeAmount, bonus, deductions, tax });
      body.check(periodEnd >= periodStart, 'periodEnd', 'Period end date must be on or after period start date.');
      body.check(netAmount >= 0, 'netAmount', 'Net amount cannot be negative.');
      body.assertValid();

      const creator = await access.requireEmployee(currentUser(req).id, 'Creator employee record not found');
      await requireTarget(employeeId);

      const payroll = payrolls.create({
        id: uuidv4(),
        employeeId,
        periodStart,
        periodEnd,
        baseSalary,
        overtimeHours,
        overtimeAmount,
        bonus,
        bonusDescription,
        deductions,
        deductionDescription,
        tax,
        netAmount,
        status: 'draft',
        paymentDate: null,
        notes,
        createdBy: creator.id,
      });
      await payrolls.save(payroll);
      return created(res, await one(payroll));
    })
  );

  router.put(
    '/payrolls/:id',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      if (payroll.status === 'paid') throw badRequest('Cannot update a payroll that has been paid');

      const body = new FieldReader(req.body);
      const overtimeHours = body.optionalNumber('overtimeHours', { min: 0 });
      const overtimeAmount = body.optionalNumber('overtimeAmount', { min: 0 });
      const bonus = body.optionalNumber('bonus', { min: 0 });
      const bonusDescription = body.optionalString('bonusDescription');
      const deductions = body.optionalNumber('deductions', { min: 0 });
      const deductionDescription = body.optionalString('deductionDescription');
      const tax = body.optionalNumber('tax', { min: 0 });
      const notes = body.optionalString('notes');
      const explicitNet = body.optionalNumber('netAmount', { min: 0 });
      body.assertValid();

      if (overtimeHours !== undefined) payroll.overtimeHours = overtimeHours;
      if (overtimeAmount !== undefined) payroll.overtimeAmount = overtimeAmount;
      if (bonus !== undefined) payroll.bonus = bonus;
      if (bonusDescription !== undefined) payroll.bonusDescription = bonusDescription;
      if (deductions !== undefined) payroll.deductions = deductions;
      if (deductionDescription !== undefined) payroll.deductionDescription = deductionDescription;
      if (tax !== undefined) payroll.tax = tax;
      if (notes !== undefined) payroll.notes = notes;

      const amountsChanged = [overtimeAmount, bonus, deductions, tax].some(v => v !== undefined);
      if (explicitNet !== undefined) payroll.netAmount = explicitNet;
      else if (amountsChanged) payroll.netAmount = computeNetAmount(payroll);
      if (payroll.netAmount < 0) {
        throw badRequest('Validation error', { netAmount: ['Net amount cannot be negative.'] });
      }

      await payrolls.save(payroll);
      return success(res, await one(payroll));
    })
  );

  router.post(
    '/payrolls/:id/process',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      if (payroll.status !== 'draft') throw badRequest('Only draft payrolls can be processed');
      payroll.status = 'processed';
      await payrolls.save(payroll);
      return success(res, await one(payroll));
    })
  );

  router.post(
    '/payrolls/:id/pay',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      if (payroll.status !== 'processed') throw badRequest('Only processed payrolls can be marked as paid');
      payroll.status = 'paid';
      payroll.paymentDate = today();
      await payrolls.save(payroll);
      return success(res, await one(payroll));
    })
  );

  router.post(
    '/payrolls/:id/cancel',
    requireRole('admin', 'hr'),
    asyncRoute(async (req, res) => {
      const payroll = await loadPayroll(req.params.id);
      if (payroll.status === 'paid') throw badRequest('Cannot cancel a payroll that has been paid');
      payroll.status = 'cancelled';
      await payrolls.save(payroll);
      return success(res, await one(payroll));
    })
  );

  router.get(
    '/my-payrolls',
    asyncRoute(async (req, res) => {
      const employee = await access.requireEmployee(currentUser(req).id, 'Employee record not found');
      const page = pageRequest(req.query, config);
      const [items, total] = await payrolls.findAndCount({
        where: { employeeId: employee.id },
        order: { periodEnd: 'DESC' },
        skip: page.skip,
        take: page.take,
      });
      return paginated(res, toPage(await withPeople(items), total, page));
    })
  );

  return router;
}
