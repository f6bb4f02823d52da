import { Module } from '@nestjs/common';

import { PacketNormalizer } from './packet-normalizer';

@Module({
  providers: [PacketNormalizer],
  exports: [PacketNormalizer],
})
export class PacketsModule {}
