import { Controller, Delete, Get, Post, Query } from '@nestjs/common';

import { EngineService } from './engine.service';
import { runCommand } from './http-errors';

@Controller('status')
export class StatusController {
  constructor(private readonly engine: EngineService) {}

  @Get()
  getStatus() {
    return this.engine.getStatus();
  }

  @Get('alerts')
  alerts(@Query('nodeId') nodeId?: string) {
    return this.engine.getActiveAlerts(nodeId);
  }

  @Post('help')
  async requestHelp() {
    await runCommand(() => this.engine.requestHelp());
    return this.engine.getStatus();
  }

  @Delete('help')
  async clearHelp() {
    await runCommand(() => this.engine.clearHelp());
    return this.engine.getStatus();
  }
}
