import { businessDays, fullYearsBetween, round2, today, yearOf } from '../utils/dates';
import type { LeaveStatus, LeaveType } from '../types';

export const BASE_ANNUAL_DAYS = 20;
export const MAX_ANNUAL_DAYS = 30;
export const SICK_DAYS = 15;
export const PERSONAL_DAYS = 3;

// Requests in these states block the calendar.
export const BLOCKING_STATUSES: LeaveStatus[] = ['pending', 'approved'];

type LeaveLike = {
  id: string;
  leaveType: LeaveType;
  startDate: string;
  endDate: string;
  days: number;
  status: LeaveStatus;
};

export type BalanceLine = {
  leaveType: 'annual' | 'sick' | 'personal';
  entitled: number;
  taken: number;
  pending: number;
  balance: number;
  unit: 'days';
};

export type LeaveBalance = {
  employee: { id: string; name: string; yearsOfService: number };
  leaveBalances: BalanceLine[];
};

export function defaultLeaveDays(startDate: string, endDate: string): number {
  return businessDays(startDate, endDate);
}

export function rangesOverlap(aStart: string, aEnd: string, bStart: string, bEnd: string): boolean {
  return aStart <= bEnd && aEnd >= bStart;
}

/** First pending or approved request that shares a day with the range, ignoring `excludeId`. */
export function findOverlap<T extends LeaveLike>(
  existing: T[],
  startDate: string,
  endDate: string,
  excludeId?: string
): T | undefined {
  return existing.find(
    l =>
      l.id !== excludeId &&
      BLOCKING_STATUSES.includes(l.status) &&
      rangesOverlap(l.startDate, l.endDate, startDate, endDate)
  );
}

export function annualEntitlement(dateOfJoining: string, asOf: string = today()): number {
  return Math.min(BASE_ANNUAL_DAYS + fullYearsBetween(dateOfJoining, asOf), MAX_ANNUAL_DAYS);
}

function sumDays(requests: LeaveLike[], type: LeaveType, status: LeaveStatus, year: number): number {
  return round2(
    requests
      .filter(r => r.leaveType === type && r.status === status && yearOf(r.startDate) === year)
      .reduce((acc, r) => acc + r.days, 0)
  );
}

export function computeBalance(
  employee: { id: string; firstName: string; lastName: string; dateOfJoining: string },
  requests: LeaveLike[],
  asOf: string = today()
): LeaveBalance {
  const year = yearOf(asOf);
  const line = (leaveType: BalanceLine['leaveType'], entitled: number, trackPending: boolean): BalanceLine => {
    const taken = sumDays(requests, leaveType, 'approved', year);
    return {
      leaveType,
      entitled,
      taken,
      pending: trackPending ? sumDays(requests, leaveType, 'pending', year) : 0,
      balance: round2(entitled - taken),
      unit: 'days',
    };
  };

  return {
    employee: {
      id: employee.id,
      name: `${employee.firstName} ${employee.lastName}`,
      yearsOfService: fullYearsBetween(employee.dateOfJoining, asOf),
    },
    leaveBalances: [
      line('annual', annualEntitlement(employee.dateOfJoining, asOf), true),
      line('sick', SICK_DAYS, false),
      line('personal', PERSONAL_DAYS, false),
    ],
  };
}
