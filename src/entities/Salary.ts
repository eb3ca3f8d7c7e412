import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import type { PayFrequency, SalaryType } from '../types';

@Entity('salaries')
@Index(['employeeId', 'effectiveDate'])
export class Salary {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 36 })
  employeeId!: string;

  @Column({ name: 'base_salary', type: 'double precision' })
  baseSalary!: number;

  @Column({ name: 'salary_type', type: 'varchar', length: 20, default: 'fixed' })
  salaryType!: SalaryType;

  @Column({ name: 'frequency', type: 'varchar', length: 20, default: 'monthly' })
  frequency!: PayFrequency;

  @Column({ name: 'effective_date', type: 'date' })
  effectiveDate!: string;

  // null while the salary is current
  @Column({ name: 'end_date', type: 'date', nullable: true })
  endDate!: string | null;

  @Column({ name: 'created_by', type: 'varchar', length: 36 })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
