import { Module } from '@nestjs/common';
import { LocksModule } from '../../locks/locks.module';
import { PipelineModule } from '../../pipeline/pipeline.module';
import { StreamingModule } from '../../streaming/streaming.module';
import { RunHistoryService } from './run-history.service';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';

@Module({
  imports: [PipelineModule, LocksModule, StreamingModule],
  controllers: [RunsController],
  providers: [RunsService, RunHistoryService],
  exports: [RunsService],
})
export class RunsModule {}
