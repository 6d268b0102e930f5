import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { TriggerRunDto, triggerEventSchema } from '../../dto/trigger-run.dto';
import { RunHistoryService } from './run-history.service';
import { RunsService } from './runs.service';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(
    private readonly runsService: RunsService,
    private readonly history: RunHistoryService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List recent runs (optionally filtered by branch)' })
  async findAll(@Query('branch') branch?: string) {
    return this.history.findAll(branch);
  }

  // must be before :id
  @Get(':id/stages/:stageId/logs')
  @ApiOperation({ summary: 'Get log lines for a stage of a run' })
  async getStageLogs(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('stageId', ParseUUIDPipe) stageId: string,
  ) {
    return this.history.getStageLogs(id, stageId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a run with its stages' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const run = await this.history.findOneWithStages(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  @Post()
  @ApiOperation({ summary: 'Trigger a run manually for an event' })
  async trigger(@Body() body: TriggerRunDto) {
    const parsed = triggerEventSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => issue.message));
    }
    return this.runsService.trigger(parsed.data, 'manual');
  }
}
