import { DataSource, In } from 'typeorm';
import { Employee, Project, ProjectMember, Task } from '../entities';
import { forbidden, notFound } from '../utils/errors';
import type { AuthUser, ProjectMemberRole, Role } from '../types';

export const PRIVILEGED_ROLES: Role[] = ['admin', 'hr'];

export function isPrivileged(user: AuthUser): boolean {
  return PRIVILEGED_ROLES.includes(user.role);
}

export type TaskEditAccess = 'full' | 'assignee' | 'none';

/**
 * Answers "who may see or touch what" for the RBAC rules shared across
 * resources: admin and HR see everything, managers see themselves and
 * their direct reports, everyone else sees only their own records.
 */
export class AccessPolicy {
  constructor(private readonly dataSource: DataSource) {}

  private get employees() {
    return this.dataSource.getRepository(Employee);
  }

  private get members() {
    return this.dataSource.getRepository(ProjectMember);
  }

  employeeForUser(userId: string): Promise<Employee | null> {
    return this.employees.findOneBy({ userId });
  }

  async requireEmployee(userId: string, message = 'Employee profile not found'): Promise<Employee> {
    const employee = await this.employeeForUser(userId);
    if (!employee) throw notFound(message);
    return employee;
  }

  async directReportIds(managerId: string): Promise<string[]> {
    const reports = await this.employees.find({ where: { managerId }, select: { id: true } });
    return reports.map(r => r.id);
  }

  async isDirectReport(managerId: string, employeeId: string): Promise<boolean> {
    return (await this.employees.countBy({ id: employeeId, managerId })) > 0;
  }

  /** True when `viewer` may read the record of `target`. */
  async canSeeEmployee(user: AuthUser, target: Employee): Promise<boolean> {
    if (isPrivileged(user)) return true;
    const own = await this.employeeForUser(user.id);
    if (!own) return false;
    if (own.id === target.id) return true;
    return user.role === 'manager' && target.managerId === own.id;
  }

  /**
   * Picks the employee a per-employee report is about: the caller when no
   * id is given, otherwise the requested id if the caller may see it.
   */
  async resolveEmployeeScope(user: AuthUser, requestedId: string | undefined, subject: string): Promise<string> {
    if (!requestedId) {
      const own = await this.requireEmployee(user.id, 'Employee not found');
      return own.id;
    }
    if (isPrivileged(user)) return requestedId;
    const own = await this.requireEmployee(user.id, 'Employee not found');
    if (own.id === requestedId) return requestedId;
    if (user.role === 'manager' && (await this.isDirectReport(own.id, requestedId))) return requestedId;
    throw forbidden(`You don't have permission to view this employee's ${subject}`);
  }

  async membership(projectId: string, employeeId: string): Promise<ProjectMember | null> {
    return this.members.findOneBy({ projectId, employeeId });
  }

  async hasMemberRole(projectId: string, employeeId: string, role: ProjectMemberRole): Promise<boolean> {
    return (await this.members.countBy({ projectId, employeeId, role })) > 0;
  }

  /** Project ids the employee created or belongs to. */
  async projectIdsFor(employeeId: string): Promise<string[]> {
    const [memberships, created] = await Promise.all([
      this.members.find({ where: { employeeId }, select: { projectId: true } }),
      this.dataSource.getRepository(Project).find({ where: { createdBy: employeeId }, select: { id: true } }),
    ]);
    return [...new Set([...memberships.map(m => m.projectId), ...created.map(p => p.id)])];
  }

  async canAccessProject(user: AuthUser, employee: Employee, project: Project): Promise<boolean> {
    if (isPrivileged(user) || project.createdBy === employee.id) return true;
    return (await this.membership(project.id, employee.id)) !== null;
  }

  async canManageProject(user: AuthUser, employee: Employee, project: Project): Promise<boolean> {
    if (isPrivileged(user) || project.createdBy === employee.id) return true;
    return this.hasMemberRole(project.id, employee.id, 'project manager');
  }

  /** Members and the creator may be assigned work in a project. */
  async isAssignable(project: Project, employeeId: string): Promise<boolean> {
    if (project.createdBy === employeeId) return true;
    return (await this.membership(project.id, employeeId)) !== null;
  }

  async canAccessTask(user: AuthUser, employee: Employee, task: Task): Promise<boolean> {
    if (isPrivileged(user)) return true;
    if (task.createdBy === employee.id || task.assigneeId === employee.id) return true;
    if (await this.membership(task.projectId, employee.id)) return true;
    const project = await this.dataSource.getRepository(Project).findOneBy({ id: task.projectId });
    return project !== null && project.createdBy === employee.id;
  }

  async taskEditAccess(user: AuthUser, employee: Employee, task: Task): Promise<TaskEditAccess> {
    if (isPrivileged(user)) return 'full';
    if (await this.hasMemberRole(task.projectId, employee.id, 'project manager')) return 'full';
    const project = await this.dataSource.getRepository(Project).findOneBy({ id: task.projectId });
    if (project?.createdBy === employee.id) return 'full';
    if (task.createdBy === employee.id) return 'full';
    if (task.assigneeId === employee.id) return 'assignee';
    return 'none';
  }

  /** Id → employee lookup that still resolves soft-deleted people. */
  async employeesById(ids: (string | null)[]): Promise<Map<string, Employee>> {
    const wanted = [...new Set(ids.filter((id): id is string => typeof id === 'string'))];
    if (wanted.length === 0) return new Map();
    const rows = await this.employees.find({ where: { id: In(wanted) }, withDeleted: true });
    return new Map(rows.map(e => [e.id, e]));
  }
}
