import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';
import type { ProjectMemberRole } from '../types';

@Entity('project_members')
@Index(['projectId', 'employeeId'], { unique: true })
export class ProjectMember {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'project_id', type: 'varchar', length: 36 })
  projectId!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 36 })
  employeeId!: string;

  @Column({ name: 'role', type: 'varchar', length: 50, default: 'member' })
  role!: ProjectMemberRole;

  @CreateDateColumn({ name: 'joined_at' })
  joinedAt!: Date;
}
