import { Module } from '@nestjs/common';

import { RefreshSchedulerService } from './refresh-scheduler.service';
import { NodesModule } from '../nodes/nodes.module';
import { StatusModule } from '../status/status.module';

@Module({
  imports: [NodesModule, StatusModule],
  providers: [RefreshSchedulerService],
  exports: [RefreshSchedulerService],
})
export class SchedulerModule {}
