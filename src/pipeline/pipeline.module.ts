import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ActionsModule } from '../actions/actions.module';
import { CODECOV_TOKEN, createChecksWorkflow } from '../workflows/checks.workflow';
import { PipelineRunnerService } from './pipeline-runner.service';
import { SecretStore } from './secret-store';
import { StageExecutorService } from './stage-executor.service';

export const CHECKS_PIPELINE = Symbol('CHECKS_PIPELINE');

@Module({
  imports: [ActionsModule],
  providers: [
    StageExecutorService,
    PipelineRunnerService,
    // built once at startup so a malformed definition stops the process before any run
    { provide: CHECKS_PIPELINE, useFactory: () => createChecksWorkflow() },
    {
      provide: SecretStore,
      useFactory: (config: ConfigService) =>
        new SecretStore({ [CODECOV_TOKEN]: config.get<string>(CODECOV_TOKEN) }),
      inject: [ConfigService],
    },
  ],
  exports: [PipelineRunnerService, CHECKS_PIPELINE, SecretStore],
})
export class PipelineModule {}
