import { eachDay, hoursBetween, isWeekday, round2 } from '../utils/dates';
import type { AttendanceStatus, WorkLocation } from '../types';

// Clock-ins strictly before this UTC time of day count as on time.
export const ON_TIME_CUTOFF = '09:30';

type AttendanceLike = {
  date: string;
  clockIn: string | null;
  clockOut: string | null;
  status: AttendanceStatus;
  workFrom: WorkLocation;
};

export type AttendanceReport = {
  period: { startDate: string; endDate: string; totalDays: number; workingDays: number };
  attendance: {
    presentDays: number;
    absentDays: number;
    halfDays: number;
    unrecordedDays: number;
    attendanceRate: number;
  };
  workHours: { totalHours: number; averageHours: number };
  location: { officeDays: number; homeDays: number; remoteDays: number };
  punctuality: { onTimeCount: number; punctualityRate: number };
};

export function hoursWorked(record: Pick<AttendanceLike, 'clockIn' | 'clockOut'>): number {
  return hoursBetween(record.clockIn, record.clockOut);
}

export function isOnTime(clockIn: string | null): boolean {
  if (!clockIn) return false;
  return clockIn.slice(11, 16) < ON_TIME_CUTOFF;
}

/** `(present + ½·half) / working · 100`, zero when there are no working days. */
export function attendanceRate(present: number, half: number, workingDays: number): number {
  return workingDays > 0 ? round2(((present + half * 0.5) / workingDays) * 100) : 0;
}

export function buildAttendanceReport(records: AttendanceLike[], startDate: string, endDate: string): AttendanceReport {
  const days = eachDay(startDate, endDate);
  const workingDates = days.filter(isWeekday);
  const count = (status: AttendanceStatus) => records.filter(r => r.status === status).length;
  const at = (location: WorkLocation) => records.filter(r => r.workFrom === location).length;

  const presentDays = count('present');
  const halfDays = count('half-day');
  const recorded = new Set(records.map(r => r.date));
  const totalHours = records.reduce((acc, r) => acc + hoursWorked(r), 0);
  const onTimeCount = records.filter(r => isOnTime(r.clockIn)).length;

  return {
    period: { startDate, endDate, totalDays: days.length, workingDays: workingDates.length },
    attendance: {
      presentDays,
      absentDays: count('absent'),
      halfDays,
      unrecordedDays: workingDates.filter(d => !recorded.has(d)).length,
      attendanceRate: attendanceRate(presentDays, halfDays, workingDates.length),
    },
    workHours: {
      totalHours: round2(totalHours),
      averageHours: presentDays > 0 ? round2(totalHours / presentDays) : 0,
    },
    location: { officeDays: at('office'), homeDays: at('home'), remoteDays: at('remote') },
    punctuality: {
      onTimeCount,
      punctualityRate: presentDays > 0 ? round2((onTimeCount / presentDays) * 100) : 0,
    },
  };
}
