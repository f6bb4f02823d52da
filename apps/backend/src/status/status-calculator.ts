import { DerivedStatus, HEALTH_COLORS, HealthColor, HealthParameter } from './status.types';
import { HealthThresholds, StatusThresholds } from '../config/engine-settings';
import { NodeState } from '../nodes/nodes.types';
import { TELEMETRY_FIELDS } from '../packets/packet.types';

interface ParameterTier {
  parameter: HealthParameter;
  color: HealthColor;
}

const severity = (color: HealthColor): number => HEALTH_COLORS.indexOf(color);

export function batteryTier(percent: number, thresholds: HealthThresholds['battery']): HealthColor {
  if (percent < thresholds.redBelow) {
    return 'RED';
  }
  return percent <= thresholds.yellowAtOrBelow ? 'YELLOW' : 'GREEN';
}

export function voltageTier(volts: number, thresholds: HealthThresholds['voltage']): HealthColor {
  if (volts < thresholds.redBelow) {
    return 'RED';
  }
  return volts < thresholds.yellowBelow ? 'YELLOW' : 'GREEN';
}

export function temperatureTier(
  celsius: number,
  thresholds: HealthThresholds['temperature'],
): HealthColor {
  if (celsius > thresholds.redAbove) {
    return 'RED';
  }
  return celsius > thresholds.yellowAbove || celsius < thresholds.yellowBelow ? 'YELLOW' : 'GREEN';
}

function parameterTiers(node: NodeState, thresholds: HealthThresholds): ParameterTier[] {
  const tiers: ParameterTier[] = [];
  const battery = node.telemetry.battery_level;
  if (battery) {
    tiers.push({ parameter: 'Battery', color: batteryTier(battery.value, thresholds.battery) });
  }
  const voltage = node.telemetry.voltage_external ?? node.telemetry.voltage_internal;
  if (voltage) {
    tiers.push({ parameter: 'Voltage', color: voltageTier(voltage.value, thresholds.voltage) });
  }
  const temperature = node.telemetry.temperature;
  if (temperature) {
    tiers.push({
      parameter: 'Temperature',
      color: temperatureTier(temperature.value, thresholds.temperature),
    });
  }
  return tiers;
}

/**
 * Derives display status from stored state and a clock reading. Overall health is the worst
 * parameter tier; `reasons` names the parameters at that worst tier, in Battery, Voltage,
 * Temperature order, and is empty when everything is GREEN.
 */
export function calculateStatus(
  node: NodeState,
  now: number,
  thresholds: StatusThresholds,
): DerivedStatus {
  const isOnline = node.lastHeard !== null && now - node.lastHeard < thresholds.offlineThresholdMs;

  const staleFields = TELEMETRY_FIELDS.filter((field) => {
    const reading = node.telemetry[field];
    return reading !== undefined && now - reading.updatedAt > thresholds.staleThresholdMs;
  });

  const motionRecent =
    node.lastMotionAt !== null && now - node.lastMotionAt < thresholds.motionWindowMs;

  const tiers = node.lastHeard === null ? [] : parameterTiers(node, thresholds.health);
  if (tiers.length === 0) {
    return { isOnline, staleFields, motionRecent, healthColor: null, reasons: [] };
  }

  const healthColor = tiers.reduce<HealthColor>(
    (worst, tier) => (severity(tier.color) > severity(worst) ? tier.color : worst),
    'GREEN',
  );
  const reasons =
    healthColor === 'GREEN'
      ? []
      : tiers.filter((tier) => tier.color === healthColor).map((tier) => tier.parameter);

  return { isOnline, staleFields, motionRecent, healthColor, reasons };
}

export function statusEquals(a: DerivedStatus, b: DerivedStatus): boolean {
  return (
    a.isOnline === b.isOnline &&
    a.motionRecent === b.motionRecent &&
    a.healthColor === b.healthColor &&
    a.reasons.length === b.reasons.length &&
    a.reasons.every((reason, index) => reason === b.reasons[index]) &&
    a.staleFields.length === b.staleFields.length &&
    a.staleFields.every((field, index) => field === b.staleFields[index])
  );
}
