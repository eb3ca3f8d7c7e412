import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import type { PayrollStatus } from '../types';

@Entity('payrolls')
@Index(['employeeId', 'periodEnd'])
export class Payroll {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 36 })
  employeeId!: string;

  @Column({ name: 'period_start', type: 'date' })
  periodStart!: string;

  @Column({ name: 'period_end', type: 'date' })
  periodEnd!: string;

  @Column({ name: 'base_salary', type: 'double precision' })
  baseSalary!: number;

  @Column({ name: 'overtime_hours', type: 'double precision', default: 0 })
  overtimeHours!: number;

  @Column({ name: 'overtime_amount', type: 'double precision', default: 0 })
  overtimeAmount!: number;

  @Column({ name: 'bonus', type: 'double precision', default: 0 })
  bonus!: number;

  @Column({ name: 'bonus_description', type: 'text', default: '' })
  bonusDescription!: string;

  @Column({ name: 'deductions', type: 'double precision', default: 0 })
  deductions!: number;

  @Column({ name: 'deduction_description', type: 'text', default: '' })
  deductionDescription!: string;

  @Column({ name: 'tax', type: 'double precision', default: 0 })
  tax!: number;

  @Column({ name: 'net_amount', type: 'double precision' })
  netAmount!: number;

  @Column({ name: 'status', type: 'varchar', length: 20, default: 'draft' })
  status!: PayrollStatus;

  @Column({ name: 'payment_date', type: 'date', nullable: true })
  paymentDate!: string | null;

  @Column({ name: 'notes', type: 'text', default: '' })
  notes!: string;

  @Column({ name: 'created_by', type: 'varchar', length: 36 })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
