#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { resolve } from 'node:path';
import { EXIT_FAILED, EXIT_OK, EXIT_USAGE, exitCodeFor, parseCliArgs, usage } from './cli/cli-args';
import { CliModule } from './cli/cli.module';
import { ConsoleRunReporter } from './cli/console-run-reporter';
import { PipelineRunnerService } from './pipeline/pipeline-runner.service';
import { CHECKS_PIPELINE } from './pipeline/pipeline.module';
import type { PipelineDefinition } from './pipeline/pipeline.types';
import { SecretStore } from './pipeline/secret-store';

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.ok === 'help') {
    process.stdout.write(usage());
    return EXIT_OK;
  }
  if (!parsed.ok) {
    process.stderr.write(`${parsed.message}\n\n${usage()}`);
    return EXIT_USAGE;
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const runner = app.get(PipelineRunnerService);
    const pipeline = app.get<PipelineDefinition>(CHECKS_PIPELINE);
    const config = app.get(ConfigService);
    const { event, workdir } = parsed.options;

    if (!runner.evaluate(pipeline, event)) {
      Logger.log(`${event.kind} on ${event.branch} matches no trigger; nothing to run`, 'checks');
      return EXIT_OK;
    }

    const result = await runner.execute(pipeline, {
      event,
      workspaceDir: resolve(workdir ?? config.get<string>('WORKSPACE_DIR') ?? process.cwd()),
      secrets: app.get(SecretStore),
      reporter: new ConsoleRunReporter(),
      defaultTimeoutMs: config.get<number>('STAGE_TIMEOUT_MS'),
    });
    return exitCodeFor(result);
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    Logger.error(err instanceof Error ? err.message : String(err), 'checks');
    process.exitCode = EXIT_FAILED;
  },
);
