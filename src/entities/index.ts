import { User } from './User';
import { Department } from './Department';
import { Employee } from './Employee';
import { Attendance } from './Attendance';
import { LeaveRequest } from './LeaveRequest';
import { Project } from './Project';
import { ProjectMember } from './ProjectMember';
import { Task } from './Task';
import { TaskComment } from './TaskComment';
import { Salary } from './Salary';
import { Payroll } from './Payroll';
import { Objective } from './Objective';
import { KeyResult } from './KeyResult';
import { ClientAccess } from './ClientAccess';

export {
  User,
  Department,
  Employee,
  Attendance,
  LeaveRequest,
  Project,
  ProjectMember,
  Task,
  TaskComment,
  Salary,
  Payroll,
  Objective,
  KeyResult,
  ClientAccess,
};

export const entities = [
  User,
  Department,
  Employee,
  Attendance,
  LeaveRequest,
  Project,
  ProjectMember,
  Task,
  TaskComment,
  Salary,
  Payroll,
  Objective,
  KeyResult,
  ClientAccess,
];
