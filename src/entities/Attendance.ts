import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import type { AttendanceStatus, WorkLocation } from '../types';

@Entity('attendance')
@Index(['employeeId', 'date'], { unique: true })
export class Attendance {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 36 })
  employeeId!: string;

  @Column({ name: 'date', type: 'date' })
  date!: string; // format: YYYY-MM-DD

  @Column({ name: 'clock_in', type: 'varchar', length: 32, nullable: true })
  clockIn!: string | null;

  @Column({ name: 'clock_out', type: 'varchar', length: 32, nullable: true })
  clockOut!: string | null;

  @Column({ name: 'status', type: 'varchar', length: 20, default: 'present' })
  status!: AttendanceStatus;

  @Column({ name: 'work_from', type: 'varchar', length: 20, default: 'office' })
  workFrom!: WorkLocation;

  @Column({ name: 'notes', type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
