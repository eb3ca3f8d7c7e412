import {
  addDays,
  businessDays,
  eachDay,
  fullYearsBetween,
  hoursBetween,
  monthEnd,
  parseDate,
  parseInstant,
} from '../src/utils/dates';

describe('date helpers', () => {
  it('parses only real calendar dates', () => {
    expect(parseDate('2024-02-29')).toBe('2024-02-29');
    expect(parseDate('2023-02-29')).toBeUndefined();
    expect(parseDate('2024-2-1')).toBeUndefined();
    expect(parseDate(20240201)).toBeUndefined();
  });

  it('normalises instants to ISO form', () => {
    expect(parseInstant('2025-03-03T09:15:00Z')).toBe('2025-03-03T09:15:00.000Z');
    expect(parseInstant('not a time')).toBeUndefined();
  });

  it('walks days across month boundaries', () => {
    expect(addDays('2025-01-31', 1)).toBe('2025-02-01');
    expect(eachDay('2025-02-27', '2025-03-02')).toEqual(['2025-02-27', '2025-02-28', '2025-03-01', '2025-03-02']);
  });

  it('counts weekdays inclusively in either order', () => {
    // Mon 2025-03-03 .. Sun 2025-03-09
    expect(businessDays('2025-03-03', '2025-03-09')).toBe(5);
    expect(businessDays('2025-03-09', '2025-03-03')).toBe(5);
    expect(businessDays('2025-03-08', '2025-03-09')).toBe(0);
  });

  it('finds month ends including leap years', () => {
    expect(monthEnd('2024-02-10')).toBe('2024-02-29');
    expect(monthEnd('2025-12-01')).toBe('2025-12-31');
  });

  it('rejects years past 9998', () => {
    expect(parseDate('9998-12-31')).toBe('9998-12-31');
    expect(parseDate('9999-12-31')).toBeUndefined();
  });

  it('stops walking at the last representable day', () => {
    expect(eachDay('9999-12-30', '9999-12-31')).toEqual(['9999-12-30', '9999-12-31']);
    expect(eachDay('2025-03-02', '2025-03-01')).toEqual([]);
    expect(businessDays('9999-12-30', '9999-12-31')).toBe(2);
  });

  it('counts whole years of service', () => {
    expect(fullYearsBetween('2020-06-15', '2025-06-14')).toBe(4);
    expect(fullYearsBetween('2020-06-15', '2025-06-15')).toBe(5);
    expect(fullYearsBetween('2026-01-01', '2025-01-01')).toBe(0);
  });

  it('measures hours between instants', () => {
    expect(hoursBetween('2025-03-03T09:00:00.000Z', '2025-03-03T17:30:00.000Z')).toBe(8.5);
    expect(hoursBetween('2025-03-03T09:00:00.000Z', null)).toBe(0);
  });
});
