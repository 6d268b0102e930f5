import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from '../config/env.validation';
import { PipelineModule } from '../pipeline/pipeline.module';

/** The runner without the HTTP service and its database. */
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }), PipelineModule],
})
export class CliModule {}
