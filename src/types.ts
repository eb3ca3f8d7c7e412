export const ROLES = ['admin', 'hr', 'manager', 'employee', 'client'] as const;
export type Role = (typeof ROLES)[number];

export const GENDERS = ['male', 'female', 'other', ''] as const;
export type Gender = (typeof GENDERS)[number];

export const ATTENDANCE_STATUSES = ['present', 'absent', 'half-day'] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export const WORK_LOCATIONS = ['office', 'home', 'remote'] as const;
export type WorkLocation = (typeof WORK_LOCATIONS)[number];

export const LEAVE_TYPES = [
  'annual',
  'sick',
  'personal',
  'maternity',
  'paternity',
  'bereavement',
  'unpaid',
  'other',
] as const;
export type LeaveType = (typeof LEAVE_TYPES)[number];

export const LEAVE_STATUSES = ['pending', 'approved', 'rejected', 'cancelled'] as const;
export type LeaveStatus = (typeof LEAVE_STATUSES)[number];

export const PROJECT_STATUSES = ['planning', 'in_progress', 'on_hold', 'completed', 'cancelled'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const PROJECT_MEMBER_ROLES = ['project manager', 'team lead', 'member'] as const;
export type ProjectMemberRole = (typeof PROJECT_MEMBER_ROLES)[number];

export const TASK_STATUSES = ['backlog', 'todo', 'in_progress', 'review', 'completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const SALARY_TYPES = ['fixed', 'hourly'] as const;
export type SalaryType = (typeof SALARY_TYPES)[number];

export const PAY_FREQUENCIES = ['monthly', 'bi-weekly', 'weekly'] as const;
export type PayFrequency = (typeof PAY_FREQUENCIES)[number];

export const PAYROLL_STATUSES = ['draft', 'processed', 'paid', 'cancelled'] as const;
export type PayrollStatus = (typeof PAYROLL_STATUSES)[number];

export const OBJECTIVE_STATUSES = ['draft', 'active', 'completed', 'cancelled'] as const;
export type ObjectiveStatus = (typeof OBJECTIVE_STATUSES)[number];

export const OBJECTIVE_TIMEFRAMES = ['monthly', 'quarterly', 'annual'] as const;
export type ObjectiveTimeframe = (typeof OBJECTIVE_TIMEFRAMES)[number];

// Identity carried in a verified access token.
export type AuthUser = {
  id: string;
  email: string;
  role: Role;
};

export type Paginated<T> = {
  items: T[];
  total: number;
  pages: number;
  page: number;
  perPage: number;
};

/** Zero-filled counter keyed by every member of an enumeration. */
export type Histogram = Record<string, number>;
