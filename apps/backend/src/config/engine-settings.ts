import type { ConfigService } from '@nestjs/config';

import { ConfigurationError } from '../errors/engine-errors';

export interface HealthThresholds {
  /** Battery percent: RED below `redBelow`, YELLOW up to and including `yellowAtOrBelow`. */
  battery: { redBelow: number; yellowAtOrBelow: number };
  /** Volts: RED below `redBelow`, YELLOW below `yellowBelow`. */
  voltage: { redBelow: number; yellowBelow: number };
  /** Celsius: RED above `redAbove`; YELLOW above `yellowAbove` or below `yellowBelow`. */
  temperature: { yellowBelow: number; yellowAbove: number; redAbove: number };
}

export interface StatusThresholds {
  offlineThresholdMs: number;
  staleThresholdMs: number;
  motionWindowMs: number;
  health: HealthThresholds;
}

export interface ThresholdRelationInput {
  offlineThresholdSeconds: number;
  sendIntervalSeconds: number;
  refreshIntervalSeconds: number;
  health: HealthThresholds;
}

/** Throws `ConfigurationError` naming every violated relation. */
export function assertThresholdRelations(input: ThresholdRelationInput): void {
  const problems: string[] = [];
  const { offlineThresholdSeconds, sendIntervalSeconds, refreshIntervalSeconds, health } = input;

  if (!(offlineThresholdSeconds > sendIntervalSeconds)) {
    problems.push(
      `offline threshold (${offlineThresholdSeconds}s) must exceed the telemetry send interval (${sendIntervalSeconds}s)`,
    );
  }
  const margin = offlineThresholdSeconds - sendIntervalSeconds;
  if (refreshIntervalSeconds <= 0 || refreshIntervalSeconds >= margin) {
    problems.push(
      `refresh interval (${refreshIntervalSeconds}s) must be positive and shorter than the offline margin (${margin}s)`,
    );
  }
  if (health.battery.redBelow > health.battery.yellowAtOrBelow) {
    problems.push('battery RED threshold must not exceed the YELLOW threshold');
  }
  if (health.voltage.redBelow > health.voltage.yellowBelow) {
    problems.push('voltage RED threshold must not exceed the YELLOW threshold');
  }
  const { yellowBelow, yellowAbove, redAbove } = health.temperature;
  if (!(yellowBelow <= yellowAbove && yellowAbove <= redAbove)) {
    problems.push('temperature thresholds must satisfy low <= high warning <= high critical');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}

export function resolveStatusThresholds(configService: ConfigService): StatusThresholds {
  const health = configService.get<HealthThresholds>('status.health');
  if (!health) {
    throw new ConfigurationError(['status.health thresholds are missing']);
  }
  return {
    offlineThresholdMs: configService.get<number>('status.offlineThresholdSeconds', 960) * 1000,
    staleThresholdMs: configService.get<number>('status.staleThresholdSeconds', 3600) * 1000,
    motionWindowMs: configService.get<number>('status.motionWindowSeconds', 300) * 1000,
    health,
  };
}
