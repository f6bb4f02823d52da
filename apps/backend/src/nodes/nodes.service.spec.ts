import { createNodeState, NodesService } from './nodes.service';
import { NormalizedRecord, RecordOrigin, TelemetryRecord, TelemetryValues } from '../packets/packet.types';

const NODE = '!0000beef';
const T = 1_700_000_000_000;

function telemetry(
  receivedAt: number,
  values: TelemetryValues,
  origin: RecordOrigin = 'live',
): TelemetryRecord {
  return {
    kind: 'telemetry',
    nodeId: NODE,
    receivedAt,
    origin,
    group: 'device',
    values,
    hopsAway: null,
  };
}

describe('NodesService', () => {
  let service: NodesService;

  beforeEach(() => {
    service = new NodesService();
  });

  it('keeps lastHeard at the latest live sample whatever the arrival order', () => {
    [T + 3_000, T + 1_000, T + 5_000, T + 2_000].forEach((at) =>
      service.apply(telemetry(at, { battery_level: 80 })),
    );

    expect(service.get(NODE)?.lastHeard).toBe(T + 5_000);
  });

  it('never lets reconciliation traffic advance lastHeard', () => {
    service.apply(telemetry(T, { battery_level: 80 }));
    service.apply(telemetry(T + 60_000, { battery_level: 75 }, 'reconciliation'));

    const node = service.get(NODE);
    expect(node?.lastHeard).toBe(T);
    expect(node?.telemetry.battery_level).toEqual({ value: 75, updatedAt: T + 60_000 });
  });

  it('creates never-heard nodes from reconciliation traffic', () => {
    const change = service.apply(telemetry(T, { temperature: 20 }, 'reconciliation'));

    expect(change.nodeIds).toEqual([NODE]);
    expect(service.get(NODE)?.lastHeard).toBeNull();
  });

  it('leaves lastHeard untouched on node info', () => {
    const record: NormalizedRecord = {
      kind: 'node-info',
      nodeId: NODE,
      receivedAt: T,
      origin: 'live',
      longName: 'Ridge Relay',
      shortName: 'RDG',
    };
    service.apply(record);

    expect(service.get(NODE)).toMatchObject({
      lastHeard: null,
      longName: 'Ridge Relay',
      shortName: 'RDG',
    });
  });

  it('updates telemetry fields independently and never with an older sample', () => {
    service.apply(telemetry(T, { battery_level: 80, temperature: 20 }));
    service.apply(telemetry(T + 10_000, { temperature: 22 }));
    service.apply(telemetry(T + 5_000, { temperature: 99, battery_level: 70 }));

    const node = service.get(NODE);
    expect(node?.telemetry.temperature).toEqual({ value: 22, updatedAt: T + 10_000 });
    expect(node?.telemetry.battery_level).toEqual({ value: 70, updatedAt: T + 5_000 });
  });

  it('returns an empty change set when nothing changed', () => {
    service.apply(telemetry(T, { battery_level: 80 }));

    expect(service.apply(telemetry(T, { battery_level: 80 })).nodeIds).toEqual([]);
  });

  it('hands out snapshots that later applies do not touch', () => {
    service.apply(telemetry(T, { battery_level: 80 }));
    const before = service.snapshot();
    const nodeBefore = before.get(NODE);

    service.apply(telemetry(T + 1_000, { battery_level: 60 }));

    expect(before.get(NODE)).toBe(nodeBefore);
    expect(nodeBefore?.telemetry.battery_level?.value).toBe(80);
    expect(service.get(NODE)?.telemetry.battery_level?.value).toBe(60);
  });

  it('records motion in the node and the motion cache', () => {
    service.apply({ kind: 'motion', nodeId: NODE, receivedAt: T, origin: 'live' });

    expect(service.get(NODE)?.lastMotionAt).toBe(T);
    expect(service.getLastMotion(NODE)).toBe(T);
  });

  it('keeps only the newest remote status report', () => {
    const report = (timestamp: number, helpRequested: boolean): NormalizedRecord => ({
      kind: 'status-broadcast',
      nodeId: NODE,
      receivedAt: T,
      origin: 'live',
      message: { nodeId: NODE, color: 'RED', reasons: ['Battery'], helpRequested, version: '1.3.0', timestamp },
    });

    expect(service.apply(report(200, true)).reason).toBe('remote-status');
    service.apply(report(100, false));

    expect(service.get(NODE)?.remoteStatus).toMatchObject({ reportedAt: 200, helpRequested: true });
  });

  it('forgets a node together with its motion entry', () => {
    service.apply({ kind: 'motion', nodeId: NODE, receivedAt: T, origin: 'live' });

    const result = service.forget(NODE);

    expect(result.removed?.id).toBe(NODE);
    expect(result.dependentCaches).toEqual(['alerts', 'remote-status', 'published-status', 'messages']);
    expect(service.get(NODE)).toBeUndefined();
    expect(service.getLastMotion(NODE)).toBeUndefined();
    expect(service.forget(NODE)).toEqual({ removed: null, dependentCaches: [] });
  });

  it('restores snapshot states without overwriting live ones', () => {
    service.apply(telemetry(T + 1_000, { battery_level: 50 }));
    const change = service.restore([
      { ...createNodeState(NODE), lastHeard: T - 1_000 },
      { ...createNodeState('!00000001'), lastHeard: T },
    ]);

    expect(change).toEqual({ nodeIds: ['!00000001'], removed: [], reason: 'restore' });
    expect(service.get(NODE)?.lastHeard).toBe(T + 1_000);
    expect(service.get('!00000001')?.lastHeard).toBe(T);
  });

  it('tracks the local help flag', () => {
    service.applyHelpFlag({ nodeId: NODE, requested: true, at: T });
    expect(service.get(NODE)).toMatchObject({ helpRequestedAt: T, helpCleared: false });

    expect(service.applyHelpFlag({ nodeId: NODE, requested: false, at: T + 1 }).nodeIds).toEqual([NODE]);
    expect(service.applyHelpFlag({ nodeId: NODE, requested: false, at: T + 2 }).nodeIds).toEqual([]);
  });

  it('does not create a node when help is cleared before it was ever requested', () => {
    const change = service.applyHelpFlag({ nodeId: NODE, requested: false, at: T });

    expect(change).toEqual({ nodeIds: [], removed: [], reason: 'help' });
    expect(service.get(NODE)).toBeUndefined();
  });
});
