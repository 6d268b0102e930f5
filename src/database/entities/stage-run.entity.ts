import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { StageLog } from './stage-log.entity';

/**
 * One stage of a run. Rows are only written for stages that started; stages after a failure have none.
 */
@Entity('stage_runs')
@Index(['pipeline_run_id', 'stage_order'], { unique: true })
export class StageRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.stages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  /** Stage id from the pipeline definition. */
  @Column({ length: 100 })
  stage_key!: string;

  @Column({ length: 255 })
  name!: string;

  /** Position in the pipeline definition (0-based). */
  @Column({ type: 'int' })
  stage_order!: number;

  @Column({ length: 50, default: 'running' })
  status!: string;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'text', nullable: true })
  artifact_path!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  error_code!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => StageLog, (log) => log.stage_run)
  logs!: StageLog[];
}
