import { Controller, Delete, Get, HttpCode, Param, Post, Query } from '@nestjs/common';

import { ForgetNodeQueryDto } from './dto/forget-node-query.dto';
import { EngineService } from '../engine/engine.service';
import { runCommand } from '../engine/http-errors';

@Controller('nodes')
export class NodesController {
  constructor(private readonly engine: EngineService) {}

  @Get()
  list() {
    return this.engine.listNodes();
  }

  @Get(':id')
  async getOne(@Param('id') id: string) {
    return runCommand(() => this.engine.getNode(id));
  }

  @Delete(':id')
  async forget(@Param('id') id: string, @Query() query: ForgetNodeQueryDto) {
    return runCommand(() => this.engine.forgetNode(id, { deleteLogs: query.deleteLogs ?? false }));
  }

  @Post(':id/telemetry-request')
  @HttpCode(202)
  async requestTelemetry(@Param('id') id: string) {
    await runCommand(() => this.engine.requestTelemetry(id));
    return { requested: true };
  }
}
