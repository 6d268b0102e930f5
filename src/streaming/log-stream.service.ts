import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { LogLevel } from '../pipeline/pipeline.types';

export interface LogStreamEvent {
  run_id: string;
  stage_run_id: string;
  stage: string;
  line_no: number;
  log_line: string;
  log_level: LogLevel;
  timestamp: string;
}

/**
 * Stage output: persisted to stage_logs and fanned out to live subscribers (SSE).
 * Lines arrive already redacted.
 */
@Injectable()
export class LogStreamService implements OnModuleDestroy {
  private readonly logSubject = new Subject<LogStreamEvent>();

  constructor(private readonly dataSource: DataSource) {}

  onModuleDestroy(): void {
    this.logSubject.complete();
  }

  getLogStream(): Observable<LogStreamEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForRun(runId: string): Observable<LogStreamEvent> {
    return this.logSubject.pipe(filter((ev) => ev.run_id === runId));
  }

  /** Publish to subscribers, then persist. */
  async appendLog(event: Omit<LogStreamEvent, 'timestamp'>): Promise<void> {
    const timestamp = new Date();
    this.logSubject.next({ ...event, timestamp: timestamp.toISOString() });
    await this.dataSource.query(
      `INSERT INTO stage_logs (stage_run_id, line_no, log_line, log_level, timestamp)
       VALUES ($1, $2, $3, $4, $5)`,
      [event.stage_run_id, event.line_no, event.log_line, event.log_level, timestamp],
    );
  }
}
