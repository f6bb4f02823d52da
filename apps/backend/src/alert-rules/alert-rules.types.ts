import type { NodeState } from '../nodes/nodes.types';
import type { DerivedStatus } from '../status/status.types';

export const ALERT_RULE_IDS = [
  'node_offline',
  'low_battery',
  'low_voltage',
  'high_voltage',
  'low_temperature',
  'high_temperature',
  'motion',
] as const;

export type AlertRuleId = (typeof ALERT_RULE_IDS)[number];

export interface AlertRuleSettings {
  enabled: boolean;
  /** Seconds for `node_offline`, percent, volts or Celsius otherwise; unused by `motion`. */
  threshold: number;
}

export type AlertRuleSet = Record<AlertRuleId, AlertRuleSettings>;

export type AlertRuleOverride = Partial<AlertRuleSettings>;

export type NodeRuleOverrides = Partial<Record<AlertRuleId, AlertRuleOverride>>;

export interface AlertRulesDocument {
  defaults?: NodeRuleOverrides;
  nodes?: Record<string, NodeRuleOverrides>;
}

export interface AlertEvent {
  id: string;
  nodeId: string;
  ruleId: AlertRuleId;
  condition: string;
  firedAt: number;
  /** Absent while the alert is active. */
  clearedAt?: number;
}

/** One evaluation input: a node snapshot with its status at a point in time. */
export interface NodeEvaluation {
  node: NodeState;
  status: DerivedStatus;
  evaluatedAt: number;
}

export function isAlertRuleId(value: string): value is AlertRuleId {
  return ALERT_RULE_IDS.some((ruleId) => ruleId === value);
}
