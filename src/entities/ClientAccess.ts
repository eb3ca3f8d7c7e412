import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

/** Grants a `client` user a read-only window onto one project. */
@Entity('client_access')
@Index(['clientId', 'projectId'], { unique: true })
export class ClientAccess {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  // user id, not employee id: clients have no employee profile
  @Column({ name: 'client_id', type: 'varchar', length: 36 })
  clientId!: string;

  @Column({ name: 'project_id', type: 'varchar', length: 36 })
  projectId!: string;

  @Column({ name: 'can_view_tasks', type: 'boolean', default: true })
  canViewTasks!: boolean;

  @Column({ name: 'can_view_comments', type: 'boolean', default: false })
  canViewComments!: boolean;

  @Column({ name: 'can_view_team', type: 'boolean', default: true })
  canViewTeam!: boolean;

  @Column({ name: 'created_by', type: 'varchar', length: 36 })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
