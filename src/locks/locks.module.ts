import { Module } from '@nestjs/common';
import { WorkspaceLockService } from './workspace-lock.service';

@Module({
  providers: [WorkspaceLockService],
  exports: [WorkspaceLockService],
})
export class LocksModule {}
