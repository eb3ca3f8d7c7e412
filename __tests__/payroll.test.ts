import { v4 as uuidv4 } from 'uuid';
import { Payroll, Project, Salary } from '../src/entities';
import { computeNetAmount } from '../src/routes/payroll';
import { Mailer } from '../src/services/mailer';
import { addDays, today } from '../src/utils/dates';
import { Account, bearer, createTestContext, TestContext } from './helpers/testApp';

const MARCH = {
  periodStart: '2025-03-01',
  periodEnd: '2025-03-31',
  baseSalary: 5000,
  overtimeAmount: 250.5,
  bonus: 300,
  deductions: 100,
  tax: 900.25,
};

describe('computeNetAmount', () => {
  it('adds earnings and subtracts deductions and tax', () => {
    expect(computeNetAmount({ baseSalary: 5000, overtimeAmount: 250.5, bonus: 300, deductions: 100, tax: 900.25 })).toBe(
      4550.25
    );
  });
});

describe('/api/payroll', () => {
  let ctx: TestContext;
  let hr: Account;
  let worker: Account;

  async function setup(mailer?: Mailer) {
    ctx = await createTestContext({}, mailer);
    hr = await ctx.account('hr', { firstName: 'Hana', lastName: 'Ross' });
    worker = await ctx.account('employee', { firstName: 'Wes', lastName: 'Kay', email: 'wes@corestack.test' });
  }

  afterEach(() => ctx.close());

  async function draft(body: Record<string, unknown> = {}): Promise<string> {
    const res = await ctx.http
      .post('/api/payroll/payrolls')
      .set(...bearer(hr))
      .send({ employeeId: worker.employee.id, ...MARCH, ...body });
    return res.body.data.id;
  }

  describe('salaries', () => {
    beforeEach(() => setup());

    it('records a salary and closes the open one', async () => {
      const repo = ctx.dataSource.getRepository(Salary);
      await repo.save(
        repo.create({
          id: uuidv4(),
          employeeId: worker.employee.id,
          baseSalary: 4000,
          salaryType: 'fixed',
          frequency: 'monthly',
          effectiveDate: '2024-01-01',
          endDate: null,
          createdBy: hr.employee.id,
        })
      );
      const effective = addDays(today(), 10);

      const res = await ctx.http
        .post('/api/payroll/salaries')
        .set(...bearer(hr))
        .send({ employeeId: worker.employee.id, baseSalary: 4500, effectiveDate: effective });
      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        baseSalary: 4500,
        salaryType: 'fixed',
        frequency: 'monthly',
        effectiveDate: effective,
        endDate: null,
        employee: { id: worker.employee.id, name: 'Wes Kay', employeeCode: worker.employee.employeeCode },
        creator: { id: hr.employee.id, name: 'Hana Ross', employeeCode: hr.employee.employeeCode },
      });

      const history = await ctx.http.get(`/api/payroll/salaries/${worker.employee.id}/history`).set(...bearer(hr));
      expect(history.body.data.map((s: { baseSalary: number; endDate: string | null }) => [s.baseSalary, s.endDate])).toEqual([
        [4500, null],
        [4000, addDays(effective, -1)],
      ]);

      const current = await ctx.http.get('/api/payroll/salaries/current').set(...bearer(hr));
      expect(current.body.data.map((s: { baseSalary: number }) => s.baseSalary)).toEqual([4000]);

      const listed = await ctx.http.get(`/api/payroll/salaries?employeeId=${worker.employee.id}`).set(...bearer(hr));
      expect(listed.body.data.total).toBe(2);
    });

    it('validates salary input', async () => {
      const res = await ctx.http
        .post('/api/payroll/salaries')
        .set(...bearer(hr))
        .send({ employeeId: worker.employee.id, baseSalary: -1, effectiveDate: '2020-01-01', frequency: 'daily' });
      expect(res.body.errors).toEqual({
        baseSalary: ['Must be greater than or equal to 0.'],
        frequency: ['Must be one of: monthly, bi-weekly, weekly.'],
        effectiveDate: ['Cannot be in the past.'],
      });

      const missing = await ctx.http
        .post('/api/payroll/salaries')
        .set(...bearer(hr))
        .send({ employeeId: 'ghost', baseSalary: 10, effectiveDate: addDays(today(), 1) });
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe('Employee not found');
    });

    it('is closed to regular employees', async () => {
      const res = await ctx.http.get('/api/payroll/salaries').set(...bearer(worker));
      expect(res.status).toBe(403);
      expect(res.body.error).toBe('Permission denied. Required roles: admin, hr');
    });
  });

  describe('payrolls', () => {
    beforeEach(() => setup());

    it('creates a draft with a computed net amount', async () => {
      const res = await ctx.http
        .post('/api/payroll/payrolls')
        .set(...bearer(hr))
        .send({ employeeId: worker.employee.id, ...MARCH });
      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        status: 'draft',
        netAmount: 4550.25,
        overtimeHours: 0,
        bonusDescription: '',
        paymentDate: null,
        createdBy: hr.employee.id,
      });
    });

    it('keeps seven-figure amounts to the cent', async () => {
      const id = await draft({ baseSalary: 1234567.89, overtimeAmount: 0, bonus: 0, deductions: 0, tax: 0 });
      const res = await ctx.http.get(`/api/payroll/payrolls/${id}`).set(...bearer(hr));
      expect(res.body.data).toMatchObject({ baseSalary: 1234567.89, netAmount: 1234567.89 });

      const moneyColumns = [
        ...ctx.dataSource.getMetadata(Payroll).columns.filter(c =>
          ['baseSalary', 'overtimeAmount', 'bonus', 'deductions', 'tax', 'netAmount'].includes(c.propertyName)
        ),
        ...ctx.dataSource.getMetadata(Salary).columns.filter(c => c.propertyName === 'baseSalary'),
        ...ctx.dataSource.getMetadata(Project).columns.filter(c => c.propertyName === 'budget'),
      ];
      expect(moneyColumns).toHaveLength(8);
      expect(new Set(moneyColumns.map(c => c.type))).toEqual(new Set(['double precision']));
    });

    it('validates the period and the net amount', async () => {
      const res = await ctx.http
        .post('/api/payroll/payrolls')
        .set(...bearer(hr))
        .send({ employeeId: worker.employee.id, ...MARCH, periodEnd: '2025-02-01', tax: 9000 });
      expect(res.body.errors).toEqual({
        periodEnd: ['Period end date must be on or after period start date.'],
        netAmount: ['Net amount cannot be negative.'],
      });
    });

    it('recomputes the net amount on update unless it is given', async () => {
      const id = await draft();
      const url = `/api/payroll/payrolls/${id}`;

      const bumped = await ctx.http.put(url).set(...bearer(hr)).send({ bonus: 500 });
      expect(bumped.body.data.netAmount).toBe(4750.25);

      const pinned = await ctx.http.put(url).set(...bearer(hr)).send({ tax: 0, netAmount: 1234 });
      expect(pinned.body.data).toMatchObject({ tax: 0, netAmount: 1234 });
    });

    it('moves through draft, processed and paid', async () => {
      const id = await draft();
      const base = `/api/payroll/payrolls/${id}`;

      const early = await ctx.http.post(`${base}/pay`).set(...bearer(hr));
      expect(early.body.error).toBe('Only processed payrolls can be marked as paid');

      expect((await ctx.http.post(`${base}/process`).set(...bearer(hr))).body.data.status).toBe('processed');
      const again = await ctx.http.post(`${base}/process`).set(...bearer(hr));
      expect(again.body.error).toBe('Only draft payrolls can be processed');

      const paid = await ctx.http.post(`${base}/pay`).set(...bearer(hr));
      expect(paid.body.data).toMatchObject({ status: 'paid', paymentDate: today() });

      const locked = await ctx.http.put(base).set(...bearer(hr)).send({ bonus: 1 });
      expect(locked.body.error).toBe('Cannot update a payroll that has been paid');
      const cancel = await ctx.http.post(`${base}/cancel`).set(...bearer(hr));
      expect(cancel.body.error).toBe('Cannot cancel a payroll that has been paid');
    });

    it('cancels unpaid payrolls', async () => {
      const id = await draft();
      const res = await ctx.http.post(`/api/payroll/payrolls/${id}/cancel`).set(...bearer(hr));
      expect(res.body.data.status).toBe('cancelled');
    });

    it('lists and filters payrolls for HR', async () => {
      await draft();
      const second = await draft({ periodStart: '2025-04-01', periodEnd: '2025-04-30' });
      await ctx.http.post(`/api/payroll/payrolls/${second}/process`).set(...bearer(hr));

      const all = await ctx.http.get('/api/payroll/payrolls').set(...bearer(hr));
      expect(all.body.data.items.map((p: { periodEnd: string }) => p.periodEnd)).toEqual(['2025-04-30', '2025-03-31']);

      const processed = await ctx.http.get('/api/payroll/payrolls?status=processed').set(...bearer(hr));
      expect(processed.body.data.items.map((p: { id: string }) => p.id)).toEqual([second]);
    });

    it('lets employees read only their own payrolls', async () => {
      const other = await ctx.account('employee');
      const id = await draft();

      const mine = await ctx.http.get('/api/payroll/my-payrolls').set(...bearer(worker));
      expect(mine.body.data.items.map((p: { id: string }) => p.id)).toEqual([id]);

      const own = await ctx.http.get(`/api/payroll/payrolls/${id}`).set(...bearer(worker));
      expect(own.body.data.id).toBe(id);

      const denied = await ctx.http.get(`/api/payroll/payrolls/${id}`).set(...bearer(other));
      expect(denied.status).toBe(403);
      expect(denied.body.error).toBe("You don't have permission to view this payroll");

      const missing = await ctx.http.get('/api/payroll/payrolls/nope').set(...bearer(hr));
      expect(missing.body.error).toBe('Payroll not found');
    });
  });

  describe('payslips', () => {
    beforeEach(() => setup());

    it('builds the payslip document', async () => {
      const id = await draft({ bonusDescription: 'Launch' });
      const res = await ctx.http
        .post('/api/payroll/payrolls/generate-payslip')
        .set(...bearer(worker))
        .send({ payrollId: id, includeSignature: true });

      expect(res.status).toBe(200);
      expect(res.body.data.employee).toEqual({
        name: 'Wes Kay',
        code: worker.employee.employeeCode,
        position: null,
        department: 'N/A',
      });
      expect(res.body.data.payroll).toMatchObject({
        period: '2025-03-01 to 2025-03-31',
        bonusDescription: 'Launch',
        netAmount: 4550.25,
      });
      expect(res.body.data.options).toEqual({ includeBreakdown: true, includeCompanyLogo: true, includeSignature: true });
    });

    it("refuses someone else's payslip", async () => {
      const other = await ctx.account('employee');
      const id = await draft();
      const res = await ctx.http
        .post('/api/payroll/payrolls/generate-payslip')
        .set(...bearer(other))
        .send({ payrollId: id });
      expect(res.status).toBe(403);
      expect(res.body.error).toBe("You don't have permission to generate this payslip");
    });

    it('serves the payslip as a PDF download', async () => {
      const id = await draft();
      const res = await ctx.http.get(`/api/payroll/payrolls/${id}/payslip.pdf`).set(...bearer(worker));

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('application/pdf');
      expect(res.headers['content-disposition']).toBe(`attachment; filename=payslip-${id}.pdf`);
      expect(Number(res.headers['content-length'])).toBeGreaterThan(0);
    });
  });

  describe('emailing payslips', () => {
    it("sends the PDF to the employee's login address", async () => {
      await setup();
      const send = jest.spyOn(ctx.mailer, 'send');
      const id = await draft();

      const res = await ctx.http.post(`/api/payroll/payrolls/${id}/email`).set(...bearer(hr)).send({});
      expect(res.body.data).toEqual({ message: 'Email sent successfully', to: 'wes@corestack.test' });
      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith(
        expect.objectContaining({
          to: 'wes@corestack.test',
          subject: 'Payslip 2025-03-01 to 2025-03-31',
          text: 'Please find attached your payslip for 2025-03-01 to 2025-03-31.',
          attachments: [expect.objectContaining({ filename: `payslip-${id}.pdf` })],
        })
      );
    });

    it('uses an explicit recipient and checks its format', async () => {
      await setup();
      const id = await draft();
      const url = `/api/payroll/payrolls/${id}/email`;

      const bad = await ctx.http.post(url).set(...bearer(hr)).send({ to: 'not-an-email' });
      expect(bad.body.errors).toEqual({ to: ['Not a valid email address.'] });

      const res = await ctx.http.post(url).set(...bearer(hr)).send({ to: 'accounts@corestack.test' });
      expect(res.body.data.to).toBe('accounts@corestack.test');
    });

    it('still renders the PDF when sending is disabled', async () => {
      await setup(new Mailer(null, '', 'disabled'));
      const id = await draft();

      const res = await ctx.http.post(`/api/payroll/payrolls/${id}/email`).set(...bearer(hr)).send({});
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ message: 'Email sending is disabled. PDF generated successfully.', pdfGenerated: true });
    });

    it('reports a missing mail configuration', async () => {
      await setup(new Mailer(null, ''));
      const id = await draft();

      const res = await ctx.http.post(`/api/payroll/payrolls/${id}/email`).set(...bearer(hr)).send({});
      expect(res.status).toBe(503);
      expect(res.body.error).toBe(
        'Email service not configured. Please configure SMTP_HOST, SMTP_USER, and SMTP_PASS environment variables.'
      );
    });
  });
});
