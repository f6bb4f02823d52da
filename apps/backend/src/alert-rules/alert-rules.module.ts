import { Module } from '@nestjs/common';

import { AlertEngineService } from './alert-engine.service';
import { AlertRulesController } from './alert-rules.controller';
import { AlertRulesService } from './alert-rules.service';

@Module({
  controllers: [AlertRulesController],
  providers: [AlertRulesService, AlertEngineService],
  exports: [AlertRulesService, AlertEngineService],
})
export class AlertRulesModule {}
