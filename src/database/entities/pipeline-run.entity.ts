import { Entity, PrimaryColumn, Column, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { StageRun } from './stage-run.entity';

/**
 * One execution of a pipeline, triggered by a webhook or manually.
 * Status follows pending → running → succeeded | failed | aborted.
 */
@Entity('pipeline_runs')
@Index(['created_at'])
export class PipelineRun {
  /** Generated by the runner before the row exists, so logs and result share one id. */
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  pipeline_name!: string;

  @Column({ length: 50 })
  trigger_type!: string;

  @Column({ length: 50 })
  event_kind!: string;

  @Column({ length: 255 })
  branch!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  revision!: string | null;

  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  failed_stage!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  error_code!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => StageRun, (stage) => stage.pipeline_run)
  stages!: StageRun[];
}
