import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Param, Put } from '@nestjs/common';

import { AlertRulesService } from './alert-rules.service';
import { AlertRuleId, isAlertRuleId } from './alert-rules.types';
import { AlertRuleOverrideDto } from './dto/alert-rule-override.dto';
import { normalizeNodeId } from '../packets/node-id';

@Controller('alert-rules')
export class AlertRulesController {
  constructor(private readonly rulesService: AlertRulesService) {}

  @Get()
  overrides() {
    return this.rulesService.getOverrides();
  }

  @Get(':nodeId')
  rules(@Param('nodeId') nodeId: string) {
    return this.rulesService.getRules(this.parseNodeId(nodeId));
  }

  @Put(':nodeId/:ruleId')
  async setOverride(
    @Param('nodeId') nodeId: string,
    @Param('ruleId') ruleId: string,
    @Body() body: AlertRuleOverrideDto,
  ) {
    return this.rulesService.setRuleOverride(this.parseNodeId(nodeId), this.parseRuleId(ruleId), {
      ...(body.enabled !== undefined ? { enabled: body.enabled } : {}),
      ...(body.threshold !== undefined ? { threshold: body.threshold } : {}),
    });
  }

  @Delete(':nodeId')
  @HttpCode(204)
  async removeOverrides(@Param('nodeId') nodeId: string): Promise<void> {
    await this.rulesService.removeNode(this.parseNodeId(nodeId));
  }

  private parseNodeId(value: string): string {
    const nodeId = normalizeNodeId(value);
    if (!nodeId) {
      throw new BadRequestException(`Invalid node id ${value}`);
    }
    return nodeId;
  }

  private parseRuleId(value: string): AlertRuleId {
    if (!isAlertRuleId(value)) {
      throw new BadRequestException(`Unknown alert rule ${value}`);
    }
    return value;
  }
}
