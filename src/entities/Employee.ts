import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, DeleteDateColumn, Index } from 'typeorm';
import type { Gender } from '../types';

@Entity('employees')
export class Employee {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'user_id', type: 'varchar', length: 36 })
  userId!: string;

  @Column({ name: 'department_id', type: 'varchar', length: 36, nullable: true })
  departmentId!: string | null;

  @Column({ name: 'first_name', type: 'varchar', length: 50 })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 50 })
  lastName!: string;

  // company-issued code, e.g. EMP001
  @Column({ name: 'employee_code', type: 'varchar', length: 20, unique: true })
  employeeCode!: string;

  @Column({ name: 'position', type: 'varchar', length: 100, nullable: true })
  position!: string | null;

  @Column({ name: 'date_of_birth', type: 'date', nullable: true })
  dateOfBirth!: string | null;

  @Column({ name: 'date_of_joining', type: 'date' })
  dateOfJoining!: string;

  @Column({ name: 'phone_number', type: 'varchar', length: 20, nullable: true })
  phoneNumber!: string | null;

  @Column({ name: 'address', type: 'text', nullable: true })
  address!: string | null;

  @Column({ name: 'gender', type: 'varchar', length: 10, nullable: true })
  gender!: Gender | null;

  @Column({ name: 'manager_id', type: 'varchar', length: 36, nullable: true })
  managerId!: string | null;

  @Column({ name: 'profile_image', type: 'varchar', length: 255, nullable: true })
  profileImage!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @DeleteDateColumn({ name: 'deleted_at', nullable: true })
  deletedAt!: Date | null;
}
