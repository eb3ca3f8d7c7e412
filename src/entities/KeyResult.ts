import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

@Entity('key_results')
@Index(['objectiveId'])
export class KeyResult {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'objective_id', type: 'varchar', length: 36 })
  objectiveId!: string;

  @Column({ name: 'title', type: 'varchar', length: 200 })
  title!: string;

  @Column({ name: 'description', type: 'text', default: '' })
  description!: string;

  @Column({ name: 'target_value', type: 'double precision' })
  targetValue!: number;

  @Column({ name: 'current_value', type: 'double precision', default: 0 })
  currentValue!: number;

  @Column({ name: 'unit', type: 'varchar', length: 30, default: '' })
  unit!: string;

  // order within the objective
  @Column({ name: 'position', type: 'integer', default: 0 })
  position!: number;

  @Column({ name: 'progress', type: 'integer', default: 0 })
  progress!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
