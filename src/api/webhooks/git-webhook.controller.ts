import { BadRequestException, Body, Controller, Headers, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBody, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RunsService } from '../runs/runs.service';
import type { TriggerOutcome } from '../runs/runs.service';
import { parseGitEvent } from './git-event.parser';

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly runsService: RunsService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Receive a GitHub-style webhook. pull_request and push events that match the
   * pipeline's triggers start a run; everything else is acknowledged and ignored.
   */
  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Receive a git webhook and trigger a run when it matches' })
  @ApiHeader({ name: 'X-GitHub-Event', required: false, description: 'pull_request or push' })
  @ApiBody({
    description: 'GitHub pull_request / push payload. The event name may also be sent as body.event.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handle(
    @Headers('x-github-event') eventHeader: string | undefined,
    @Body() body: Record<string, unknown>,
  ): Promise<TriggerOutcome> {
    const eventName = eventHeader ?? (typeof body.event === 'string' ? body.event : undefined);
    const parsed = parseGitEvent(eventName, body);
    if (!parsed.ok) {
      if (parsed.invalid) throw new BadRequestException(parsed.reason);
      return { triggered: false, reason: parsed.reason };
    }

    const expectedRepo = this.configService.get<string>('WEBHOOK_REPOSITORY');
    if (expectedRepo && parsed.event.repository !== expectedRepo) {
      return { triggered: false, reason: `repository ${parsed.event.repository ?? '(none)'} is not watched` };
    }

    return this.runsService.trigger(parsed.event, `git_${parsed.event.kind}`, body);
  }
}
