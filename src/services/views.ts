import { Employee } from '../entities';

// Response shapes for records that must not be serialised as-is.

export function fullName(e: Pick<Employee, 'firstName' | 'lastName'>): string {
  return `${e.firstName} ${e.lastName}`;
}

export function employeeSummary(e: Employee) {
  return {
    id: e.id,
    firstName: e.firstName,
    lastName: e.lastName,
    employeeCode: e.employeeCode,
    position: e.position,
    profileImage: e.profileImage,
  };
}

/** Compact person reference embedded in other resources. */
export function personRef(e: Employee | undefined) {
  return e ? { id: e.id, name: fullName(e), employeeCode: e.employeeCode } : null;
}
