import { Module } from '@nestjs/common';

import { EngineService } from './engine.service';
import { StatusController } from './status.controller';
import { AlertRulesModule } from '../alert-rules/alert-rules.module';
import { BroadcastModule } from '../broadcast/broadcast.module';
import { MeshModule } from '../mesh/mesh.module';
import { MessagesController } from '../messages/messages.controller';
import { MessagesModule } from '../messages/messages.module';
import { NodesController } from '../nodes/nodes.controller';
import { NodesModule } from '../nodes/nodes.module';
import { PacketsModule } from '../packets/packets.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { StatusModule } from '../status/status.module';

@Module({
  imports: [
    MeshModule,
    PacketsModule,
    NodesModule,
    StatusModule,
    AlertRulesModule,
    BroadcastModule,
    MessagesModule,
    PersistenceModule,
    SchedulerModule,
  ],
  controllers: [NodesController, MessagesController, StatusController],
  providers: [EngineService],
  exports: [EngineService, MessagesModule],
})
export class EngineModule {}
