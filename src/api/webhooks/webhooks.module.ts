import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { RunsModule } from '../runs/runs.module';

@Module({
  imports: [RunsModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
