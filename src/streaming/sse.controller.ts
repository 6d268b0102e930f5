import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogStreamService, LogStreamEvent } from './log-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly logStream: LogStreamService) {}

  /**
   * GET /stream/logs/:runId - stage output of one run as it is produced.
   */
  @Sse('logs/:runId')
  @ApiOperation({ summary: 'SSE: real-time stage logs for a run' })
  streamRunLogs(@Param('runId') runId: string): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStreamForRun(runId).pipe(map((ev) => ({ data: ev })));
  }

  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time stage logs for all runs' })
  streamAllLogs(): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStream().pipe(map((ev) => ({ data: ev })));
  }
}
