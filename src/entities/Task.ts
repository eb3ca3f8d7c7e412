import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import type { TaskPriority, TaskStatus } from '../types';

@Entity('tasks')
@Index(['projectId'])
export class Task {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'title', type: 'varchar', length: 200 })
  title!: string;

  @Column({ name: 'description', type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'project_id', type: 'varchar', length: 36 })
  projectId!: string;

  @Column({ name: 'assignee_id', type: 'varchar', length: 36, nullable: true })
  assigneeId!: string | null;

  @Column({ name: 'created_by', type: 'varchar', length: 36 })
  createdBy!: string;

  @Column({ name: 'status', type: 'varchar', length: 20, default: 'todo' })
  status!: TaskStatus;

  @Column({ name: 'priority', type: 'varchar', length: 20, default: 'medium' })
  priority!: TaskPriority;

  // 0-100
  @Column({ name: 'progress', type: 'integer', default: 0 })
  progress!: number;

  @Column({ name: 'estimated_hours', type: 'double precision', nullable: true })
  estimatedHours!: number | null;

  @Column({ name: 'due_date', type: 'date', nullable: true })
  dueDate!: string | null;

  @Column({ name: 'completed_at', type: 'varchar', length: 32, nullable: true })
  completedAt!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
