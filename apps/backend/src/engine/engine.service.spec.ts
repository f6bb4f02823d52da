import { Logger } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { EngineModule } from './engine.module';
import { EngineService } from './engine.service';
import { AlertEvent } from '../alert-rules/alert-rules.types';
import {
  ForbiddenOperationError,
  PersistenceError,
  TransportError,
  UnknownNodeError,
} from '../errors/engine-errors';
import { MeshTransport } from '../mesh/mesh-transport';
import { ChangeSet } from '../nodes/nodes.types';
import { createNodeState } from '../nodes/nodes.service';
import { TelemetryLogService } from '../persistence/telemetry-log.service';
import { FakeMeshTransport } from '../testing/fake-mesh-transport';
import { buildTestConfig, LOCAL_NODE_ID, REMOTE_NODE_ID } from '../testing/test-config';

const REMOTE_NUMBER = 0xbeef;

describe('EngineService', () => {
  let dir: string;
  let transport: FakeMeshTransport;
  let moduleRef: TestingModule;
  let engine: EngineService;
  let changes: ChangeSet[];
  let alerts: AlertEvent[];

  async function boot(): Promise<void> {
    const config = buildTestConfig({
      persistence: { dataDir: dir, snapshotDebounceMs: 10 },
      alerts: { rulesFile: join(dir, 'alert-rules.json') },
      broadcast: { initialDelaySeconds: 3600 },
    });
    moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => config] }), EngineModule],
    })
      .overrideProvider(MeshTransport)
      .useValue(transport)
      .compile();
    engine = moduleRef.get(EngineService);
    changes = [];
    alerts = [];
    engine.subscribeChanges((change) => changes.push(change));
    engine.subscribeAlerts((alert) => alerts.push(alert));
    await moduleRef.init();
  }

  async function deliver(envelope: unknown, reconciliation = false): Promise<void> {
    await engine.enqueue({ envelope, reconciliation, arrivedAt: Date.now() });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'engine-'));
    transport = new FakeMeshTransport();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('connects the transport and listens for packets on start', async () => {
    await boot();

    expect(engine.connectionState()).toBe('connected');
    expect(transport.listenerCount).toBe(1);
  });

  it('starts without a broker and keeps the node store usable', async () => {
    transport.failConnect = true;
    await boot();

    expect(engine.connectionState()).toBe('error');
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { temperature: 21 } });
    expect(engine.listNodes().map((view) => view.state.id)).toEqual([REMOTE_NODE_ID]);
  });

  it('applies telemetry, publishes the change and raises alerts', async () => {
    await boot();

    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 10 } });

    expect(changes).toEqual([{ nodeIds: [REMOTE_NODE_ID], removed: [], reason: 'packet' }]);
    expect(alerts).toMatchObject([{ nodeId: REMOTE_NODE_ID, ruleId: 'low_battery' }]);
    expect(engine.getNode(REMOTE_NODE_ID).status).toMatchObject({
      isOnline: true,
      healthColor: 'RED',
      reasons: ['Battery'],
    });
  });

  it('drops malformed packets and keeps ingesting', async () => {
    await boot();

    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 'full' } });
    await deliver({ from: REMOTE_NUMBER, type: 'text', payload: '[ICP-STATUS]PURPLE' });
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { temperature: 21 } });

    expect(changes.map((change) => change.nodeIds)).toEqual([[REMOTE_NODE_ID]]);
    expect(engine.listNodes()).toHaveLength(1);
  });

  it('processes transport events in arrival order', async () => {
    await boot();

    transport.emit({ from: REMOTE_NUMBER, type: 'nodeinfo', payload: { longname: 'Ridge Relay' } });
    transport.emit({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 90 } });
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 80 } });

    expect(engine.getNode(REMOTE_NODE_ID).state).toMatchObject({ longName: 'Ridge Relay' });
    expect(engine.getNode(REMOTE_NODE_ID).state.telemetry.battery_level?.value).toBe(80);
  });

  it('forgets a node with its motion, alerts, messages and logs in one change', async () => {
    await boot();
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 10 } });
    await deliver({ from: REMOTE_NUMBER, type: 'detection', payload: {} });
    await deliver({ from: REMOTE_NUMBER, to: 4294967295, type: 'text', payload: 'hello' });
    expect(engine.listMessages(REMOTE_NODE_ID)).toHaveLength(1);
    changes.length = 0;

    const result = await engine.forgetNode(REMOTE_NODE_ID, { deleteLogs: true });

    expect(result).toEqual({ nodeId: REMOTE_NODE_ID, clearedAlerts: 1, logsDeleted: true });
    expect(changes).toEqual([{ nodeIds: [], removed: [REMOTE_NODE_ID], reason: 'forget' }]);
    expect(engine.listNodes()).toEqual([]);
    expect(engine.getActiveAlerts(REMOTE_NODE_ID)).toEqual([]);
    expect(engine.listMessages(REMOTE_NODE_ID)).toEqual([]);
    expect(await readdir(join(dir, 'logs'))).toEqual([]);
    expect(() => engine.getNode(REMOTE_NODE_ID)).toThrow(UnknownNodeError);
  });

  it('still forgets a node when its telemetry logs cannot be deleted', async () => {
    await boot();
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 80 } });
    jest
      .spyOn(moduleRef.get(TelemetryLogService), 'deleteNodeLogs')
      .mockRejectedValue(new PersistenceError('log-delete', join(dir, 'logs')));

    const result = await engine.forgetNode(REMOTE_NODE_ID, { deleteLogs: true });

    expect(result).toEqual({ nodeId: REMOTE_NODE_ID, clearedAlerts: 0, logsDeleted: false });
    expect(engine.listNodes()).toEqual([]);
  });

  it('refuses to forget the local node or an unknown one', async () => {
    await boot();

    await expect(engine.forgetNode(LOCAL_NODE_ID)).rejects.toBeInstanceOf(ForbiddenOperationError);
    await expect(engine.forgetNode('!12345678')).rejects.toBeInstanceOf(UnknownNodeError);
  });

  it('sends tagged messages and records them', async () => {
    await boot();

    const message = await engine.requestSend(REMOTE_NODE_ID, 'check in', true);

    expect(transport.sent).toEqual([
      { destination: REMOTE_NODE_ID, payload: `[MSG:${message.id}]check in`, wantAck: true },
    ]);
    expect(engine.listMessages(REMOTE_NODE_ID)).toEqual([message]);
  });

  it('surfaces transport failures to the caller', async () => {
    await boot();
    await transport.disconnect();

    await expect(engine.requestSend('^all', 'anyone?')).rejects.toBeInstanceOf(TransportError);
    expect(engine.listMessages()).toEqual([]);
  });

  it('sends a read receipt to the sender the first time a message is marked read', async () => {
    await boot();
    await deliver({ from: REMOTE_NUMBER, to: 4294967295, type: 'text', payload: '[MSG:0000beef_9]are you there' });
    expect(engine.getStatus().unreadMessages).toBe(1);

    const first = await engine.markMessageRead('0000beef_9', 1_700_000_005_000);
    const second = await engine.markMessageRead('0000beef_9', 1_700_000_009_000);

    expect(first).toMatchObject({ message: { id: '0000beef_9', readAt: 1_700_000_005_000 }, receiptSent: true });
    expect(second).toMatchObject({ message: { readAt: 1_700_000_005_000 }, receiptSent: false });
    expect(transport.sent).toEqual([{ destination: REMOTE_NODE_ID, payload: '[RECEIPT:0000beef_9]', wantAck: false }]);
    expect(engine.listUnreadMessages()).toEqual([]);
  });

  it('marks untagged text read without sending a receipt', async () => {
    await boot();
    await deliver({ from: REMOTE_NUMBER, to: 4294967295, type: 'text', payload: 'plain hello' });
    const [message] = engine.listUnreadMessages();

    const result = await engine.markMessageRead(message.id);

    expect(result.receiptSent).toBe(false);
    expect(transport.sent).toEqual([]);
  });

  it('warns when the ingest backlog passes its high-water mark', async () => {
    await boot();
    const warn = jest.spyOn(Logger.prototype, 'warn');

    for (let index = 0; index < 503; index += 1) {
      transport.emit({ from: REMOTE_NUMBER, type: 'nodeinfo', payload: { longname: `Relay ${index}` } });
    }
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { temperature: 21 } });

    expect(warn.mock.calls.filter(([message]) => String(message).startsWith('Ingest backlog'))).toEqual([
      ['Ingest backlog at 501 packets'],
    ]);
    expect(engine.getNode(REMOTE_NODE_ID).state.longName).toBe('Relay 502');
  });

  it('asks a known node for telemetry', async () => {
    await boot();
    await deliver({ from: REMOTE_NUMBER, type: 'position', payload: {} });

    await engine.requestTelemetry(REMOTE_NODE_ID);

    expect(transport.sent).toEqual([{ destination: REMOTE_NODE_ID, payload: '[REQ:TELEMETRY]', wantAck: true }]);
    await expect(engine.requestTelemetry('!12345678')).rejects.toBeInstanceOf(UnknownNodeError);
  });

  it('keeps the snapshot lastHeard when reconciliation traffic arrives after a restart', async () => {
    const lastHeard = Date.now() - 60_000;
    await mkdir(dir, { recursive: true });
    await writeFile(
      join(dir, 'latest_data.json'),
      JSON.stringify({
        schemaVersion: 1,
        savedAt: new Date(lastHeard).toISOString(),
        nodes: [{ ...createNodeState(REMOTE_NODE_ID), lastHeard, longName: 'Ridge Relay' }],
      }),
      'utf-8',
    );
    await boot();

    expect(changes[0]).toEqual({ nodeIds: [REMOTE_NODE_ID], removed: [], reason: 'restore' });
    await deliver({ from: REMOTE_NUMBER, type: 'telemetry', payload: { battery_level: 70 } }, true);

    const node = engine.getNode(REMOTE_NODE_ID).state;
    expect(node.lastHeard).toBe(lastHeard);
    expect(node.telemetry.battery_level?.value).toBe(70);
  });

  it('reports help requests in the engine status', async () => {
    await boot();

    engine.requestHelp();

    expect(engine.getStatus()).toMatchObject({
      connection: 'connected',
      localNodeId: LOCAL_NODE_ID,
      helpRequested: true,
    });
    expect(changes).toEqual([{ nodeIds: [LOCAL_NODE_ID], removed: [], reason: 'help' }]);
    expect(transport.sent[0].payload).toMatch(/^\[ICP-STATUS\]GREEN\|\|YES\|1\.3\.0\|\d+$/);
  });
});
