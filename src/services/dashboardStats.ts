import { hoursWorked, isOnTime } from './attendanceStats';
import { round2 } from '../utils/dates';
import type { AttendanceStatus, Histogram } from '../types';

// Chart hours run from 09:00 to 17:00 UTC.
export const FIRST_HOUR = 9;
export const LAST_HOUR = 17;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

type DayRecord = {
  date: string;
  status: AttendanceStatus;
  clockIn: string | null;
  clockOut: string | null;
};

export type Series = { name: string; data: number[] };

export function histogram<K extends string>(keys: readonly K[], values: readonly K[]): Histogram {
  return Object.fromEntries(keys.map(k => [k, values.filter(v => v === k).length]));
}

/** Completed share of a status histogram, as a percentage. */
export function completionRateOf(counts: Histogram): number {
  const total = Object.values(counts).reduce((a, b) => a + b, 0);
  return total === 0 ? 0 : round2(((counts.completed ?? 0) / total) * 100);
}

export function hourLabels(): string[] {
  const labels: string[] = [];
  for (let h = FIRST_HOUR; h <= LAST_HOUR; h++) labels.push(`${h}:00`);
  return labels;
}

function hourOf(instant: string): number {
  return Number(instant.slice(11, 13));
}

/** Clock-ins per hour slot for a single day. */
export function clockInsByHour(records: Pick<DayRecord, 'clockIn'>[]): number[] {
  const data = hourLabels().map(() => 0);
  for (const r of records) {
    if (!r.clockIn) continue;
    const h = hourOf(r.clockIn);
    if (h >= FIRST_HOUR && h <= LAST_HOUR) data[h - FIRST_HOUR] += 1;
  }
  return data;
}

/** 1 for every hour slot between clock-in and clock-out, else 0. */
export function workedHourSlots(clockIn: string | null, clockOut: string | null): number[] {
  const data = hourLabels().map(() => 0);
  if (!clockIn || !clockOut) return data;
  const from = Math.max(0, hourOf(clockIn) - FIRST_HOUR);
  const to = Math.min(data.length, hourOf(clockOut) - FIRST_HOUR);
  for (let i = from; i < to; i++) data[i] = 1;
  return data;
}

export function dayLabel(date: string, period: 'week' | 'month'): string {
  if (period === 'month') return date.slice(8, 10);
  return WEEKDAYS[new Date(`${date}T00:00:00.000Z`).getUTCDay()];
}

/** Daily present / absent / half-day counts across `dates`. */
export function dailyStatusSeries(records: DayRecord[], dates: string[]): Series[] {
  const index = new Map(dates.map((d, i) => [d, i]));
  const present = dates.map(() => 0);
  const absent = dates.map(() => 0);
  const half = dates.map(() => 0);
  for (const r of records) {
    const i = index.get(r.date);
    if (i === undefined) continue;
    if (r.status === 'present') present[i] += 1;
    else if (r.status === 'absent') absent[i] += 1;
    else half[i] += 1;
  }
  return [
    { name: 'Present', data: present },
    { name: 'Absent', data: absent },
    { name: 'Half-day', data: half },
  ];
}

/** Mean of per-day attendance rates, skipping days with nothing recorded. */
export function averageAttendanceRate(present: number[], absent: number[], half: number[]): number {
  const rates: number[] = [];
  present.forEach((p, i) => {
    const total = p + absent[i] + half[i];
    if (total > 0) rates.push(((p + half[i] * 0.5) / total) * 100);
  });
  return rates.length ? round2(rates.reduce((a, b) => a + b, 0) / rates.length) : 0;
}

/** One employee's statuses and hours per day; `null` marks unrecorded days. */
export function personalSeries(records: DayRecord[], dates: string[]) {
  const byDate = new Map(records.map(r => [r.date, r]));
  const statusData = dates.map(d => byDate.get(d)?.status ?? null);
  const hoursData = dates.map(d => {
    const r = byDate.get(d);
    return r ? hoursWorked(r) : 0;
  });
  return {
    datasets: [{ name: 'Hours Worked', data: hoursData }],
    statusData,
    summary: {
      presentDays: statusData.filter(s => s === 'present').length,
      absentDays: statusData.filter(s => s === 'absent').length,
      halfDays: statusData.filter(s => s === 'half-day').length,
      notRecorded: statusData.filter(s => s === null).length,
      totalHours: round2(hoursData.reduce((a, b) => a + b, 0)),
    },
  };
}

export function punctualitySplit(records: Pick<DayRecord, 'clockIn'>[]) {
  const clockedIn = records.filter(r => r.clockIn);
  const onTime = clockedIn.filter(r => isOnTime(r.clockIn)).length;
  return { onTime, late: clockedIn.length - onTime };
}

/** Birthday later this month (or today), ignoring the year. */
export function hasUpcomingBirthday(dateOfBirth: string | null, reference: string): boolean {
  if (!dateOfBirth) return false;
  return dateOfBirth.slice(5, 7) === reference.slice(5, 7) && dateOfBirth.slice(8, 10) >= reference.slice(8, 10);
}
