import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AlertRulesService } from './alert-rules.service';
import {
  ALERT_RULE_IDS,
  AlertEvent,
  AlertRuleId,
  AlertRuleSettings,
  NodeEvaluation,
} from './alert-rules.types';

interface RuleCheck {
  /** null when the node has no data for the rule; the rule is then skipped. */
  active: boolean | null;
  condition: string;
}

const formatMinutes = (ms: number): string => `${Math.floor(ms / 60_000)} min`;

/**
 * Edge-triggered alert decisions. Each (node, rule) pair is either quiescent or firing; an event
 * is emitted only on a transition, and a clear repeats the fired event with `clearedAt` set.
 */
@Injectable()
export class AlertEngineService {
  private readonly logger = new Logger(AlertEngineService.name);
  private readonly enabled: boolean;
  private readonly startupGraceMs: number;
  private readonly firing = new Map<string, Map<AlertRuleId, AlertEvent>>();
  private startedAt = Date.now();

  constructor(
    configService: ConfigService,
    private readonly rulesService: AlertRulesService,
  ) {
    this.enabled = configService.get<boolean>('alerts.enabled', true);
    this.startupGraceMs = configService.get<number>('alerts.startupGraceSeconds', 600) * 1000;
  }

  /** Restarts the startup grace period. */
  markStarted(at = Date.now()): void {
    this.startedAt = at;
  }

  inGracePeriod(now: number): boolean {
    return now - this.startedAt < this.startupGraceMs;
  }

  evaluate(nodeId: string, previous: NodeEvaluation | undefined, current: NodeEvaluation): AlertEvent[] {
    if (!this.enabled || this.inGracePeriod(current.evaluatedAt)) {
      return [];
    }

    const rules = this.rulesService.getRules(nodeId);
    const nodeFiring = this.firing.get(nodeId) ?? new Map<AlertRuleId, AlertEvent>();
    const events: AlertEvent[] = [];

    ALERT_RULE_IDS.forEach((ruleId) => {
      const active = nodeFiring.get(ruleId);
      const settings = rules[ruleId];

      if (!settings.enabled) {
        if (active) {
          nodeFiring.delete(ruleId);
          events.push({ ...active, clearedAt: current.evaluatedAt });
        }
        return;
      }

      const check = this.check(ruleId, settings, previous, current, active !== undefined);
      if (check.active === null) {
        return;
      }
      if (check.active && !active) {
        const event: AlertEvent = {
          id: `${nodeId}:${ruleId}:${current.evaluatedAt}`,
          nodeId,
          ruleId,
          condition: check.condition,
          firedAt: current.evaluatedAt,
        };
        nodeFiring.set(ruleId, event);
        events.push(event);
        this.logger.warn(`Alert ${ruleId} fired for ${nodeId}: ${check.condition}`);
      } else if (!check.active && active) {
        nodeFiring.delete(ruleId);
        events.push({ ...active, clearedAt: current.evaluatedAt });
        this.logger.log(`Alert ${ruleId} cleared for ${nodeId}`);
      }
    });

    if (nodeFiring.size > 0) {
      this.firing.set(nodeId, nodeFiring);
    } else {
      this.firing.delete(nodeId);
    }
    return events;
  }

  getActiveAlerts(nodeId?: string): AlertEvent[] {
    if (nodeId !== undefined) {
      return Array.from(this.firing.get(nodeId)?.values() ?? []);
    }
    return Array.from(this.firing.values()).flatMap((rules) => Array.from(rules.values()));
  }

  /** Drops every active alert and rule state of a node without emitting clears. */
  clearNode(nodeId: string): AlertEvent[] {
    const dropped = this.getActiveAlerts(nodeId);
    this.firing.delete(nodeId);
    return dropped;
  }

  private check(
    ruleId: AlertRuleId,
    settings: AlertRuleSettings,
    previous: NodeEvaluation | undefined,
    current: NodeEvaluation,
    firing: boolean,
  ): RuleCheck {
    const { node, status, evaluatedAt } = current;
    const threshold = settings.threshold;
    const voltage = (node.telemetry.voltage_external ?? node.telemetry.voltage_internal)?.value;
    const battery = node.telemetry.battery_level?.value;
    const temperature = node.telemetry.temperature?.value;

    switch (ruleId) {
      case 'node_offline': {
        if (node.lastHeard === null) {
          return { active: null, condition: '' };
        }
        const silentFor = evaluatedAt - node.lastHeard;
        return {
          active: silentFor >= threshold * 1000,
          condition: `offline for ${formatMinutes(silentFor)} (threshold ${formatMinutes(threshold * 1000)})`,
        };
      }
      case 'low_battery':
        return battery === undefined
          ? { active: null, condition: '' }
          : { active: battery < threshold, condition: `battery ${battery}% below ${threshold}%` };
      case 'low_voltage':
        return voltage === undefined
          ? { active: null, condition: '' }
          : { active: voltage < threshold, condition: `voltage ${voltage}V below ${threshold}V` };
      case 'high_voltage':
        return voltage === undefined
          ? { active: null, condition: '' }
          : { active: voltage > threshold, condition: `voltage ${voltage}V above ${threshold}V` };
      case 'low_temperature':
        return temperature === undefined
          ? { active: null, condition: '' }
          : {
              active: temperature < threshold,
              condition: `temperature ${temperature}°C below ${threshold}°C`,
            };
      case 'high_temperature':
        return temperature === undefined
          ? { active: null, condition: '' }
          : {
              active: temperature > threshold,
              condition: `temperature ${temperature}°C above ${threshold}°C`,
            };
      case 'motion': {
        if (node.lastMotionAt === null) {
          return { active: null, condition: '' };
        }
        const recent = status.motionRecent;
        if (firing) {
          return { active: recent, condition: 'motion detected' };
        }
        const newMotion = previous === undefined || previous.node.lastMotionAt !== node.lastMotionAt;
        return { active: recent && newMotion, condition: 'motion detected' };
      }
    }
  }
}
