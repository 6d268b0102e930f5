import { Module } from '@nestjs/common';
import { PipelineModule } from '../../pipeline/pipeline.module';
import { PipelinesController } from './pipelines.controller';

@Module({
  imports: [PipelineModule],
  controllers: [PipelinesController],
})
export class PipelinesModule {}
