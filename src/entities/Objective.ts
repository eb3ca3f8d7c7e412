import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import type { ObjectiveStatus, ObjectiveTimeframe } from '../types';

@Entity('objectives')
@Index(['employeeId'])
export class Objective {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 36 })
  employeeId!: string;

  @Column({ name: 'title', type: 'varchar', length: 200 })
  title!: string;

  @Column({ name: 'description', type: 'text', default: '' })
  description!: string;

  @Column({ name: 'timeframe', type: 'varchar', length: 20, default: 'quarterly' })
  timeframe!: ObjectiveTimeframe;

  @Column({ name: 'start_date', type: 'date' })
  startDate!: string;

  @Column({ name: 'end_date', type: 'date' })
  endDate!: string;

  @Column({ name: 'status', type: 'varchar', length: 20, default: 'draft' })
  status!: ObjectiveStatus;

  // mean of the key results' progress, 0-100
  @Column({ name: 'progress', type: 'integer', default: 0 })
  progress!: number;

  @Column({ name: 'created_by', type: 'varchar', length: 36 })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
