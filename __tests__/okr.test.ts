import { keyResultProgress, objectiveProgress } from '../src/routes/okr';
import { addDays } from '../src/utils/dates';
import { Account, bearer, createTestContext, futureWeekday, TestContext } from './helpers/testApp';

describe('keyResultProgress', () => {
  it('floors the percentage and caps it at 100', () => {
    expect(keyResultProgress(30, 40)).toBe(75);
    expect(keyResultProgress(1, 3)).toBe(33);
    expect(keyResultProgress(50, 40)).toBe(100);
    expect(keyResultProgress(5, 0)).toBe(0);
  });
});

describe('objectiveProgress', () => {
  it('takes the floored mean of its key results', () => {
    expect(objectiveProgress([{ progress: 75 }, { progress: 100 }, { progress: 33 }])).toBe(69);
    expect(objectiveProgress([])).toBe(0);
  });
});

describe('/api/okrs', () => {
  let ctx: TestContext;
  let lead: Account;
  let report: Account;
  let outsider: Account;
  const start = futureWeekday();
  const end = addDays(start, 90);

  beforeEach(async () => {
    ctx = await createTestContext();
    lead = await ctx.account('manager', { firstName: 'Lea', lastName: 'Lead' });
    report = await ctx.account('employee', { firstName: 'Rik', lastName: 'Report', managerId: lead.employee.id });
    outsider = await ctx.account('employee');
  });

  afterEach(() => ctx.close());

  function createOkr(who: Account, body: Record<string, unknown> = {}) {
    return ctx.http
      .post('/api/okrs')
      .set(...bearer(who))
      .send({
        employeeId: report.employee.id,
        title: 'Ship the portal',
        startDate: start,
        endDate: end,
        keyResults: [
          { title: 'Signed-up customers', targetValue: 40, unit: 'customers' },
          { title: 'Pages migrated', targetValue: 10 },
        ],
        ...body,
      });
  }

  describe('POST /', () => {
    it('creates a draft objective with ordered key results', async () => {
      const res = await createOkr(lead);

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        title: 'Ship the portal',
        description: '',
        timeframe: 'quarterly',
        status: 'draft',
        progress: 0,
        startDate: start,
        endDate: end,
        employee: { id: report.employee.id, name: 'Rik Report', employeeCode: report.employee.employeeCode },
        creator: { id: lead.employee.id, name: 'Lea Lead', employeeCode: lead.employee.employeeCode },
      });
      expect(res.body.data.keyResults).toMatchObject([
        { title: 'Signed-up customers', targetValue: 40, currentValue: 0, unit: 'customers', position: 0, progress: 0 },
        { title: 'Pages migrated', targetValue: 10, currentValue: 0, unit: '', position: 1, progress: 0 },
      ]);
    });

    it('validates dates and key results', async () => {
      const backwards = await createOkr(lead, { endDate: addDays(start, -1), keyResults: [] });
      expect(backwards.status).toBe(400);
      expect(backwards.body.errors).toEqual({ endDate: ['End date must be on or after start date.'] });

      const junk = await createOkr(lead, { keyResults: ['junk', { title: 'Zero', targetValue: 0 }] });
      expect(junk.body.errors).toEqual({
        keyResults: ['Entry 0 is not a valid key result.', 'Entry 1 is not a valid key result.'],
      });

      const ghost = await createOkr(lead, { employeeId: 'ghost' });
      expect(ghost.status).toBe(404);
      expect(ghost.body.error).toBe('Target employee not found');
    });

    it('limits managers to their team and employees to nothing', async () => {
      const foreign = await createOkr(lead, { employeeId: outsider.employee.id });
      expect(foreign.status).toBe(403);
      expect(foreign.body.error).toBe('You can only create OKRs for yourself or your team members');

      const self = await createOkr(report, { employeeId: report.employee.id });
      expect(self.status).toBe(403);
      expect(self.body.error).toBe('Permission denied. Required roles: admin, hr, manager');

      const hr = await ctx.account('hr');
      expect((await createOkr(hr, { employeeId: outsider.employee.id })).status).toBe(201);
    });
  });

  describe('lifecycle', () => {
    it('activates, tracks key results and completes', async () => {
      const id = (await createOkr(lead)).body.data.id;

      const activated = await ctx.http.post(`/api/okrs/${id}/activate`).set(...bearer(lead));
      expect(activated.body.data.status).toBe('active');
      const again = await ctx.http.post(`/api/okrs/${id}/activate`).set(...bearer(lead));
      expect(again.status).toBe(400);
      expect(again.body.error).toBe('Only draft OKRs can be activated');

      const [customers] = activated.body.data.keyResults;
      const updated = await ctx.http
        .put(`/api/okrs/key-results/${customers.id}`)
        .set(...bearer(report))
        .send({ currentValue: 30 });
      expect(updated.status).toBe(200);
      expect(updated.body.data.progress).toBe(37);
      expect(updated.body.data.keyResults[0]).toMatchObject({ currentValue: 30, progress: 75 });

      const badTarget = await ctx.http
        .put(`/api/okrs/key-results/${customers.id}`)
        .set(...bearer(report))
        .send({ targetValue: 0 });
      expect(badTarget.body.errors).toEqual({ targetValue: ['Target value must be greater than 0'] });

      const completed = await ctx.http.post(`/api/okrs/${id}/complete`).set(...bearer(report));
      expect(completed.body.data.status).toBe('completed');

      const edit = await ctx.http.put(`/api/okrs/${id}`).set(...bearer(lead)).send({ title: 'Later' });
      expect(edit.status).toBe(400);
      expect(edit.body.error).toBe('Cannot update a completed OKR');
      const krEdit = await ctx.http
        .put(`/api/okrs/key-results/${customers.id}`)
        .set(...bearer(report))
        .send({ currentValue: 40 });
      expect(krEdit.body.error).toBe('Cannot update key results in a completed OKR');
      const cancel = await ctx.http.post(`/api/okrs/${id}/cancel`).set(...bearer(lead));
      expect(cancel.body.error).toBe('Cannot cancel a completed OKR');
    });

    it('completes only active objectives and cancels once', async () => {
      const id = (await createOkr(lead)).body.data.id;

      const early = await ctx.http.post(`/api/okrs/${id}/complete`).set(...bearer(report));
      expect(early.status).toBe(400);
      expect(early.body.error).toBe('Only active OKRs can be completed');

      const cancelled = await ctx.http.post(`/api/okrs/${id}/cancel`).set(...bearer(lead));
      expect(cancelled.body.data.status).toBe('cancelled');
      const twice = await ctx.http.post(`/api/okrs/${id}/cancel`).set(...bearer(lead));
      expect(twice.body.error).toBe('OKR is already cancelled');
    });

    it('updates details and sets progress by hand', async () => {
      const id = (await createOkr(lead)).body.data.id;

      const res = await ctx.http
        .put(`/api/okrs/${id}`)
        .set(...bearer(report))
        .send({ title: 'Ship the new portal', timeframe: 'annual', progress: 40 });
      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ title: 'Ship the new portal', timeframe: 'annual', progress: 40 });

      const bad = await ctx.http.put(`/api/okrs/${id}`).set(...bearer(report)).send({ progress: 101 });
      expect(bad.status).toBe(400);
      expect(Object.keys(bad.body.errors)).toEqual(['progress']);
    });
  });

  describe('reading', () => {
    it('scopes lists to the caller and their team', async () => {
      await createOkr(lead, { title: 'Team goal' });
      await createOkr(lead, { title: 'Own goal', employeeId: lead.employee.id });
      const hr = await ctx.account('hr');
      await createOkr(hr, { title: 'Elsewhere', employeeId: outsider.employee.id });

      const titles = async (who: Account, query = '') => {
        const res = await ctx.http.get(`/api/okrs${query}`).set(...bearer(who));
        return res.body.data.items.map((o: { title: string }) => o.title).sort();
      };
      expect(await titles(hr)).toEqual(['Elsewhere', 'Own goal', 'Team goal']);
      expect(await titles(lead)).toEqual(['Own goal', 'Team goal']);
      expect(await titles(report)).toEqual(['Team goal']);
      expect(await titles(hr, `?employeeId=${outsider.employee.id}`)).toEqual(['Elsewhere']);

      const mine = await ctx.http.get('/api/okrs/mine').set(...bearer(lead));
      expect(mine.body.data.items.map((o: { title: string }) => o.title)).toEqual(['Own goal']);

      const peek = await ctx.http.get(`/api/okrs?employeeId=${lead.employee.id}`).set(...bearer(report));
      expect(peek.status).toBe(403);
      expect(peek.body.error).toBe('You can only view your own OKRs');
    });

    it('guards single objectives', async () => {
      const id = (await createOkr(lead)).body.data.id;

      expect((await ctx.http.get(`/api/okrs/${id}`).set(...bearer(report))).status).toBe(200);
      const denied = await ctx.http.get(`/api/okrs/${id}`).set(...bearer(outsider));
      expect(denied.status).toBe(403);
      expect(denied.body.error).toBe('You can only view your own OKRs');

      const missing = await ctx.http.get('/api/okrs/nope').set(...bearer(lead));
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe('OKR not found');
    });
  });
});
