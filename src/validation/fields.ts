import { badRequest, FieldErrors } from '../utils/errors';
import { parseDate, parseInstant, today } from '../utils/dates';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidEmail(email?: string): boolean {
  if (!email || typeof email !== 'string') return false;
  const simpleRe = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return simpleRe.test(email.trim());
}

type StringRule = { min?: number; max?: number };
type NumberRule = { min?: number; max?: number; integer?: boolean };
type DateRule = { notFuture?: string; notPast?: string };

/**
 * Reads fields out of an untrusted JSON body, collecting one or more
 * messages per field. The `require*` readers return a placeholder when the
 * field is invalid, so callers must run `assertValid()` before using them.
 */
export class FieldReader {
  private readonly errors: FieldErrors = {};
  private readonly body: Record<string, unknown>;

  constructor(body: unknown) {
    this.body = isRecord(body) ? body : {};
  }

  has(field: string): boolean {
    return this.body[field] !== undefined;
  }

  fail(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  check(condition: boolean, field: string, message: string): void {
    if (!condition) this.fail(field, message);
  }

  get valid(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  assertValid(): void {
    if (!this.valid) throw badRequest('Validation error', this.errors);
  }

  requireString(field: string, rule: StringRule = {}): string {
    const value = this.optionalString(field, rule);
    if (value === undefined && !this.errors[field]) this.fail(field, 'Missing data for required field.');
    return value ?? '';
  }

  optionalString(field: string, rule: StringRule = {}): string | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string') {
      this.fail(field, 'Not a valid string.');
      return undefined;
    }
    const value = raw.trim();
    if (rule.min !== undefined && value.length < rule.min) {
      this.fail(field, `Length must be at least ${rule.min}.`);
      return undefined;
    }
    if (rule.max !== undefined && value.length > rule.max) {
      this.fail(field, `Length must be at most ${rule.max}.`);
      return undefined;
    }
    return value;
  }

  /** Like `optionalString`, but an explicit `null` clears the field. */
  nullableString(field: string, rule: StringRule = {}): string | null | undefined {
    if (this.body[field] === null) return null;
    return this.optionalString(field, rule);
  }

  requireEmail(field: string): string {
    const value = this.requireString(field);
    if (value && !isValidEmail(value)) this.fail(field, 'Not a valid email address.');
    return value.toLowerCase();
  }

  requireEnum<T extends string>(field: string, allowed: readonly T[]): T {
    const value = this.optionalEnum(field, allowed);
    if (value === undefined && !this.errors[field]) this.fail(field, 'Missing data for required field.');
    return value ?? allowed[0];
  }

  optionalEnum<T extends string>(field: string, allowed: readonly T[]): T | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    const match = allowed.find(a => typeof raw === 'string' && a === raw.toLowerCase());
    if (match === undefined) this.fail(field, `Must be one of: ${allowed.join(', ')}.`);
    return match;
  }

  requireDate(field: string, rule: DateRule = {}): string {
    const value = this.optionalDate(field, rule);
    if (value === undefined && !this.errors[field]) this.fail(field, 'Missing data for required field.');
    return value ?? today();
  }

  optionalDate(field: string, rule: DateRule = {}): string | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    const value = parseDate(raw);
    if (value === undefined) {
      this.fail(field, 'Not a valid date (YYYY-MM-DD).');
      return undefined;
    }
    if (rule.notFuture !== undefined && value > rule.notFuture) this.fail(field, 'Cannot be in the future.');
    if (rule.notPast !== undefined && value < rule.notPast) this.fail(field, 'Cannot be in the past.');
    return value;
  }

  nullableDate(field: string, rule: DateRule = {}): string | null | undefined {
    if (this.body[field] === null) return null;
    return this.optionalDate(field, rule);
  }

  optionalInstant(field: string): string | undefined {
    const raw = this.body[field];
    if (raw === undefined || raw === null) return undefined;
    const value = parseInstant(raw);
    if (value === undefined) this.fail(field, 'Not a valid datetime.');
    return value;
  }

  requireNumber(field: string, rule: NumberRule = {}): number {
    const value = this.optionalNumber(field, rule);
    if (value === undefined && !this.errors[field]) this.fail(field, 'Missing data for required field.');
    return value ?? 0;
  }

  optionalNumber(field: string, rule: NumberRule = {}): number | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      this.fail(field, 'Not a valid number.');
      return undefined;
    }
    if (rule.integer && !Number.isInteger(raw)) this.fail(field, 'Not a valid integer.');
    if (rule.min !== undefined && raw < rule.min) this.fail(field, `Must be greater than or equal to ${rule.min}.`);
    if (rule.max !== undefined && raw > rule.max) this.fail(field, `Must be less than or equal to ${rule.max}.`);
    return raw;
  }

  nullableNumber(field: string, rule: NumberRule = {}): number | null | undefined {
    if (this.body[field] === null) return null;
    return this.optionalNumber(field, rule);
  }

  optionalBoolean(field: string): boolean | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'boolean') {
      this.fail(field, 'Not a valid boolean.');
      return undefined;
    }
    return raw;
  }

  requireId(field: string): string {
    return this.requireString(field, { min: 1, max: 36 });
  }

  nullableId(field: string): string | null | undefined {
    return this.nullableString(field, { min: 1, max: 36 });
  }

  optionalList(field: string): unknown[] | undefined {
    const raw = this.body[field];
    if (raw === undefined) return undefined;
    if (!Array.isArray(raw)) {
      this.fail(field, 'Not a valid list.');
      return undefined;
    }
    return raw;
  }
}

/** Reads an optional query-string value as a single string. */
export function queryString(query: Record<string, unknown>, key: string): string | undefined {
  const value = query[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Parses an optional `YYYY-MM-DD` query parameter; malformed input is a 400. */
export function queryDate(query: Record<string, unknown>, key: string): string | undefined {
  const raw = queryString(query, key);
  if (raw === undefined) return undefined;
  const value = parseDate(raw);
  if (value === undefined) throw badRequest('Invalid date format. Use YYYY-MM-DD');
  return value;
}

/** Parses an optional enumerated query parameter; unknown values are a 400. */
export function queryEnum<T extends string>(
  query: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  label: string
): T | undefined {
  const raw = queryString(query, key);
  if (raw === undefined) return undefined;
  const match = allowed.find(a => a === raw.toLowerCase());
  if (match === undefined) throw badRequest(`Invalid ${label}: ${raw}`);
  return match;
}
