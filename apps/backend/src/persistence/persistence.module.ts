import { Module } from '@nestjs/common';

import { SnapshotService } from './snapshot.service';
import { TelemetryLogService } from './telemetry-log.service';
import { NodesModule } from '../nodes/nodes.module';

@Module({
  imports: [NodesModule],
  providers: [SnapshotService, TelemetryLogService],
  exports: [SnapshotService, TelemetryLogService],
})
export class PersistenceModule {}
