import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CHECKS_PIPELINE } from '../../pipeline/pipeline.module';
import type { PipelineDefinition } from '../../pipeline/pipeline.types';

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(@Inject(CHECKS_PIPELINE) private readonly checks: PipelineDefinition) {}

  @Get('checks')
  @ApiOperation({ summary: 'Get the checks pipeline definition (triggers and stages)' })
  findChecks(): PipelineDefinition {
    return this.checks;
  }
}
