import { FieldReader, queryDate, queryEnum } from '../src/validation/fields';
import { HttpError } from '../src/utils/errors';

describe('FieldReader', () => {
  it('collects every field error before failing', () => {
    const body = new FieldReader({ name: '', count: 'three', when: '2025-13-01' });
    body.requireString('name', { min: 1 });
    body.requireNumber('count');
    body.optionalDate('when');
    body.requireEmail('email');

    expect(body.valid).toBe(false);
    let thrown: unknown;
    try {
      body.assertValid();
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(HttpError);
    if (thrown instanceof HttpError) {
      expect(thrown.status).toBe(400);
      expect(thrown.message).toBe('Validation error');
      expect(thrown.errors).toEqual({
        name: ['Length must be at least 1.'],
        count: ['Not a valid number.'],
        when: ['Not a valid date (YYYY-MM-DD).'],
        email: ['Missing data for required field.'],
      });
    }
  });

  it('trims strings and lowercases emails', () => {
    const body = new FieldReader({ email: '  Someone@Corestack.Test ', title: '  Launch  ' });
    expect(body.requireEmail('email')).toBe('someone@corestack.test');
    expect(body.requireString('title')).toBe('Launch');
    expect(body.valid).toBe(true);
  });

  it('distinguishes explicit null from an absent field', () => {
    const body = new FieldReader({ notes: null });
    expect(body.nullableString('notes')).toBeNull();
    expect(body.nullableString('reason')).toBeUndefined();
  });

  it('matches enum values case-insensitively', () => {
    const body = new FieldReader({ status: 'APPROVED', kind: 'other' });
    expect(body.optionalEnum('status', ['pending', 'approved'] as const)).toBe('approved');
    expect(body.optionalEnum('kind', ['a', 'b'] as const)).toBeUndefined();
    expect(body.valid).toBe(false);
  });

  it('applies date bounds', () => {
    const body = new FieldReader({ born: '2030-01-01', due: '2020-01-01' });
    body.optionalDate('born', { notFuture: '2025-01-01' });
    body.optionalDate('due', { notPast: '2025-01-01' });
    expect(() => body.assertValid()).toThrow('Validation error');
  });

  it('treats a non-object body as empty', () => {
    const body = new FieldReader('oops');
    expect(body.has('anything')).toBe(false);
  });
});

describe('query helpers', () => {
  it('rejects unknown enum values with a labelled message', () => {
    expect(() => queryEnum({ status: 'done' }, 'status', ['todo', 'completed'] as const, 'status')).toThrow(
      'Invalid status: done'
    );
    expect(queryEnum({}, 'status', ['todo'] as const, 'status')).toBeUndefined();
  });

  it('rejects malformed dates', () => {
    expect(() => queryDate({ startDate: '03/04/2025' }, 'startDate')).toThrow('Invalid date format. Use YYYY-MM-DD');
    expect(queryDate({ startDate: '2025-03-04' }, 'startDate')).toBe('2025-03-04');
  });
});
