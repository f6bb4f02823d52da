import { Module } from '@nestjs/common';

import { StatusBroadcasterService } from './status-broadcaster.service';
import { StatusReceiverService } from './status-receiver.service';
import { MeshModule } from '../mesh/mesh.module';
import { NodesModule } from '../nodes/nodes.module';
import { StatusModule } from '../status/status.module';

@Module({
  imports: [MeshModule, NodesModule, StatusModule],
  providers: [StatusBroadcasterService, StatusReceiverService],
  exports: [StatusBroadcasterService, StatusReceiverService],
})
export class BroadcastModule {}
