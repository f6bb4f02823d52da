import { StatusBroadcasterService } from './status-broadcaster.service';
import { StatusReceiverService } from './status-receiver.service';
import { NodesService } from '../nodes/nodes.service';
import { StatusBroadcastRecord, TelemetryRecord } from '../packets/packet.types';
import { DerivedStatusService } from '../status/derived-status.service';
import { FakeMeshTransport } from '../testing/fake-mesh-transport';
import { createTestConfigService, LOCAL_NODE_ID, REMOTE_NODE_ID } from '../testing/test-config';

const T = 1_700_000_000_000;

function remoteReport(nodeId: string, helpRequested: boolean, timestamp: number): StatusBroadcastRecord {
  return {
    kind: 'status-broadcast',
    nodeId,
    receivedAt: timestamp * 1000,
    origin: 'live',
    message: { nodeId, color: 'YELLOW', reasons: ['Voltage'], helpRequested, version: '1.3.0', timestamp },
  };
}

function localBattery(batteryLevel: number): TelemetryRecord {
  return {
    kind: 'telemetry',
    nodeId: LOCAL_NODE_ID,
    receivedAt: Date.now(),
    origin: 'live',
    group: 'device',
    values: { battery_level: batteryLevel },
    hopsAway: null,
  };
}

describe('StatusBroadcasterService', () => {
  let transport: FakeMeshTransport;
  let nodes: NodesService;
  let broadcaster: StatusBroadcasterService;
  let receiver: StatusReceiverService;

  beforeEach(async () => {
    jest.useFakeTimers({ now: T });
    const config = createTestConfigService();
    transport = new FakeMeshTransport();
    await transport.connect();
    nodes = new NodesService();
    broadcaster = new StatusBroadcasterService(config, transport, nodes, new DerivedStatusService(config));
    receiver = new StatusReceiverService(config, nodes);
  });

  afterEach(async () => {
    await broadcaster.stop();
    jest.useRealTimers();
  });

  it('sends the first heartbeat after the initial delay', async () => {
    broadcaster.start();

    await jest.advanceTimersByTimeAsync(29_999);
    expect(transport.sent).toEqual([]);

    await jest.advanceTimersByTimeAsync(1);
    expect(transport.sent).toEqual([
      { destination: '^all', payload: '[ICP-STATUS]GREEN||NO|1.3.0|1700000030', wantAck: false },
    ]);
  });

  it('broadcasts a help request at once and clears it after an hour', async () => {
    broadcaster.start();
    broadcaster.requestHelp();
    await jest.advanceTimersByTimeAsync(0);

    expect(broadcaster.isHelpRequested()).toBe(true);
    expect(transport.sent[0].payload).toBe('[ICP-STATUS]GREEN||YES|1.3.0|1700000000');

    await jest.advanceTimersByTimeAsync(3_601_000);

    expect(broadcaster.isHelpRequested()).toBe(false);
    expect(nodes.get(LOCAL_NODE_ID)).toMatchObject({ helpRequestedAt: T, helpCleared: true });
    expect(transport.sent.map((sent) => sent.payload)).toEqual([
      '[ICP-STATUS]GREEN||YES|1.3.0|1700000000',
      '[ICP-STATUS]GREEN||YES|1.3.0|1700000900',
      '[ICP-STATUS]GREEN||YES|1.3.0|1700001800',
      '[ICP-STATUS]GREEN||YES|1.3.0|1700002700',
      '[ICP-STATUS]GREEN||NO|1.3.0|1700003600',
    ]);
  });

  it('publishes help changes for the facade', () => {
    const changes: string[][] = [];
    broadcaster.getLocalChangesStream().subscribe((change) => changes.push(change.nodeIds));
    broadcaster.start();

    broadcaster.requestHelp();
    broadcaster.clearHelp();
    broadcaster.clearHelp();

    expect(changes).toEqual([[LOCAL_NODE_ID], [LOCAL_NODE_ID]]);
  });

  it('sends immediately when the local health changes after a heartbeat', async () => {
    broadcaster.start();
    await jest.advanceTimersByTimeAsync(30_000);

    nodes.apply({
      kind: 'telemetry',
      nodeId: LOCAL_NODE_ID,
      receivedAt: Date.now(),
      origin: 'live',
      group: 'device',
      values: { battery_level: 15 },
      hopsAway: null,
    });
    broadcaster.notifyLocalStatus();
    await jest.advanceTimersByTimeAsync(0);
    broadcaster.notifyLocalStatus();
    await jest.advanceTimersByTimeAsync(0);

    expect(transport.sent.map((sent) => sent.payload)).toEqual([
      '[ICP-STATUS]GREEN||NO|1.3.0|1700000030',
      '[ICP-STATUS]RED|Battery|NO|1.3.0|1700000030',
    ]);
  });

  it('sends a health change that happens before the first heartbeat', async () => {
    broadcaster.start();
    await jest.advanceTimersByTimeAsync(1_000);

    nodes.apply(localBattery(10));
    broadcaster.notifyLocalStatus();
    await jest.advanceTimersByTimeAsync(0);

    expect(transport.sent.map((sent) => sent.payload)).toEqual(['[ICP-STATUS]RED|Battery|NO|1.3.0|1700000001']);
  });

  it('sends a health change after a heartbeat that failed to go out', async () => {
    await transport.disconnect();
    broadcaster.start();
    await jest.advanceTimersByTimeAsync(30_000);
    expect(transport.sent).toEqual([]);

    await transport.connect();
    nodes.apply(localBattery(10));
    broadcaster.notifyLocalStatus();
    await jest.advanceTimersByTimeAsync(0);

    expect(transport.sent.map((sent) => sent.payload)).toEqual(['[ICP-STATUS]RED|Battery|NO|1.3.0|1700000030']);
  });

  it('does not announce a help clear when help was never requested', async () => {
    broadcaster.start();

    expect(broadcaster.clearHelp().nodeIds).toEqual([]);
    await jest.advanceTimersByTimeAsync(0);
    expect(transport.sent).toEqual([]);
    expect(nodes.get(LOCAL_NODE_ID)).toBeUndefined();
  });

  it('never clears a remote help flag by itself', async () => {
    broadcaster.start();
    receiver.receive(remoteReport(REMOTE_NODE_ID, true, 1_700_000_000));

    await jest.advanceTimersByTimeAsync(3_601_000);

    expect(nodes.get(REMOTE_NODE_ID)?.remoteStatus?.helpRequested).toBe(true);
  });

  it('rejects status broadcasts that claim to be from the local node', () => {
    broadcaster.start();

    const change = receiver.receive(remoteReport(LOCAL_NODE_ID, false, 1_700_000_000));

    expect(change.nodeIds).toEqual([]);
    expect(nodes.get(LOCAL_NODE_ID)).toBeUndefined();
  });
});
