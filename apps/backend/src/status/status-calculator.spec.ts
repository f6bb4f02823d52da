import { batteryTier, calculateStatus, statusEquals, temperatureTier, voltageTier } from './status-calculator';
import { StatusThresholds } from '../config/engine-settings';
import { NodeState, TelemetryReadings } from '../nodes/nodes.types';
import { createNodeState } from '../nodes/nodes.service';

const T = 1_700_000_000_000;

const thresholds: StatusThresholds = {
  offlineThresholdMs: 960_000,
  staleThresholdMs: 3_600_000,
  motionWindowMs: 300_000,
  health: {
    battery: { redBelow: 25, yellowAtOrBelow: 50 },
    voltage: { redBelow: 3.5, yellowBelow: 4.0 },
    temperature: { yellowBelow: 0, yellowAbove: 35, redAbove: 45 },
  },
};

function heardNode(telemetry: TelemetryReadings, lastHeard: number | null = T): NodeState {
  return { ...createNodeState('!0000beef'), lastHeard, telemetry };
}

const reading = (value: number, updatedAt = T) => ({ value, updatedAt });

describe('calculateStatus', () => {
  it('treats the offline threshold as exclusive', () => {
    const node = heardNode({});

    expect(calculateStatus(node, T + 959_000, thresholds).isOnline).toBe(true);
    expect(calculateStatus(node, T + 960_000, thresholds).isOnline).toBe(false);
    expect(calculateStatus(node, T + 961_000, thresholds).isOnline).toBe(false);
  });

  it('reports a never-heard node as offline with no health', () => {
    const node = heardNode({ battery_level: reading(90) }, null);

    expect(calculateStatus(node, T, thresholds)).toEqual({
      isOnline: false,
      staleFields: [],
      motionRecent: false,
      healthColor: null,
      reasons: [],
    });
  });

  it('has no health color when none of the health parameters is present', () => {
    const node = heardNode({ humidity: reading(40) });

    expect(calculateStatus(node, T, thresholds).healthColor).toBeNull();
  });

  it('names only the parameters at the worst tier', () => {
    const node = heardNode({
      battery_level: reading(15),
      voltage_internal: reading(3.6),
      temperature: reading(20),
    });

    const status = calculateStatus(node, T, thresholds);
    expect(status.healthColor).toBe('RED');
    expect(status.reasons).toEqual(['Battery']);
  });

  it('lists every parameter sharing the worst tier in fixed order', () => {
    const node = heardNode({
      temperature: reading(40),
      voltage_internal: reading(3.8),
      battery_level: reading(80),
    });

    const status = calculateStatus(node, T, thresholds);
    expect(status.healthColor).toBe('YELLOW');
    expect(status.reasons).toEqual(['Voltage', 'Temperature']);
  });

  it('is GREEN with no reasons when every parameter is healthy', () => {
    const node = heardNode({ battery_level: reading(95), temperature: reading(21) });

    expect(calculateStatus(node, T, thresholds)).toMatchObject({ healthColor: 'GREEN', reasons: [] });
  });

  it('prefers the external voltage over the internal one', () => {
    const node = heardNode({ voltage_internal: reading(4.1), voltage_external: reading(3.2) });

    expect(calculateStatus(node, T, thresholds)).toMatchObject({
      healthColor: 'RED',
      reasons: ['Voltage'],
    });
  });

  it('marks fields stale independently of the online state', () => {
    const node = heardNode({
      battery_level: reading(90, T - 3_600_001),
      temperature: reading(20, T - 3_600_000),
    });

    const status = calculateStatus(node, T, thresholds);
    expect(status.isOnline).toBe(true);
    expect(status.staleFields).toEqual(['battery_level']);
  });

  it('reports motion only inside the window', () => {
    const node: NodeState = { ...heardNode({}), lastMotionAt: T };

    expect(calculateStatus(node, T + 299_999, thresholds).motionRecent).toBe(true);
    expect(calculateStatus(node, T + 300_000, thresholds).motionRecent).toBe(false);
  });
});

describe('health tiers', () => {
  const { battery, voltage, temperature } = thresholds.health;

  it('grades battery percent', () => {
    expect([24, 25, 50, 51].map((percent) => batteryTier(percent, battery))).toEqual([
      'RED',
      'YELLOW',
      'YELLOW',
      'GREEN',
    ]);
  });

  it('grades voltage', () => {
    expect([3.49, 3.5, 3.99, 4.0].map((volts) => voltageTier(volts, voltage))).toEqual([
      'RED',
      'YELLOW',
      'YELLOW',
      'GREEN',
    ]);
  });

  it('grades temperature on both sides', () => {
    expect([-1, 0, 35, 36, 45, 46].map((celsius) => temperatureTier(celsius, temperature))).toEqual([
      'YELLOW',
      'GREEN',
      'GREEN',
      'YELLOW',
      'YELLOW',
      'RED',
    ]);
  });
});

describe('statusEquals', () => {
  it('compares reasons and stale fields by value', () => {
    const node = heardNode({ battery_level: reading(15) });
    const a = calculateStatus(node, T, thresholds);
    const b = calculateStatus(node, T + 1_000, thresholds);

    expect(statusEquals(a, b)).toBe(true);
    expect(statusEquals(a, { ...b, reasons: [] })).toBe(false);
  });
});
