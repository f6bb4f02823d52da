import { Module } from '@nestjs/common';

import { DerivedStatusService } from './derived-status.service';

@Module({
  providers: [DerivedStatusService],
  exports: [DerivedStatusService],
})
export class StatusModule {}
