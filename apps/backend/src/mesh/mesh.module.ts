import { Module } from '@nestjs/common';

import { MeshTransport } from './mesh-transport';
import { MqttMeshTransport } from './mqtt-mesh-transport.service';

@Module({
  providers: [{ provide: MeshTransport, useClass: MqttMeshTransport }],
  exports: [MeshTransport],
})
export class MeshModule {}
