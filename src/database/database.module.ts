import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PipelineRun, StageRun, StageLog } from './entities';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.getOrThrow<string>('DATABASE_URL'),
        entities: [PipelineRun, StageRun, StageLog],
        // Only one process should synchronize the database
        synchronize: config.get<boolean>('SYNC_DATABASE') === true,
      }),
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
