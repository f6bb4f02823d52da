import { Module } from '@nestjs/common';

import { TelemetryGateway } from './telemetry.gateway';
import { EngineModule } from '../engine/engine.module';

@Module({
  imports: [EngineModule],
  providers: [TelemetryGateway],
})
export class WsModule {}
