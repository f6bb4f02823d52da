import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { SnapshotService } from './snapshot.service';
import { PersistenceError } from '../errors/engine-errors';
import { NodesService } from '../nodes/nodes.service';
import { createTestConfigService } from '../testing/test-config';

const NODE = '!0000beef';
const T = 1_700_000_000_000;

describe('SnapshotService', () => {
  let dir: string;
  let nodes: NodesService;
  let snapshots: SnapshotService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'snapshot-'));
    nodes = new NodesService();
    snapshots = new SnapshotService(
      createTestConfigService({ persistence: { dataDir: dir, snapshotDebounceMs: 50 } }),
      nodes,
    );
  });

  afterEach(async () => {
    snapshots.onModuleDestroy();
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when there is no snapshot', async () => {
    await expect(snapshots.load()).resolves.toEqual([]);
  });

  it('round-trips the store through a versioned document', async () => {
    nodes.apply({
      kind: 'telemetry',
      nodeId: NODE,
      receivedAt: T,
      origin: 'live',
      group: 'device',
      values: { battery_level: 77 },
      hopsAway: 1,
    });

    await snapshots.saveNow();
    const document = JSON.parse(await readFile(join(dir, 'latest_data.json'), 'utf-8'));
    const loaded = await snapshots.load();

    expect(document.schemaVersion).toBe(1);
    expect(loaded).toEqual(nodes.list());
  });

  it('keeps lastHeard from the snapshot when reconciliation traffic follows', async () => {
    nodes.apply({
      kind: 'motion',
      nodeId: NODE,
      receivedAt: T,
      origin: 'live',
    });
    await snapshots.saveNow();

    const restarted = new NodesService();
    restarted.restore(await snapshots.load());
    restarted.apply({
      kind: 'telemetry',
      nodeId: NODE,
      receivedAt: T + 120_000,
      origin: 'reconciliation',
      group: 'environment',
      values: { temperature: 18 },
      hopsAway: null,
    });

    expect(restarted.get(NODE)?.lastHeard).toBe(T);
    expect(restarted.getLastMotion(NODE)).toBe(T);
  });

  it.each([
    ['invalid JSON', '{"schemaVersion":'],
    ['an unknown schema version', JSON.stringify({ schemaVersion: 2, savedAt: 'x', nodes: [] })],
    ['a malformed node', JSON.stringify({ schemaVersion: 1, savedAt: 'x', nodes: [{ id: 5 }] })],
  ])('starts empty from %s', async (_label, contents) => {
    await writeFile(join(dir, 'latest_data.json'), contents, 'utf-8');

    await expect(snapshots.load()).resolves.toEqual([]);
  });

  it('coalesces scheduled saves into one write', async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
    try {
      const saveNow = jest.spyOn(snapshots, 'saveNow');
      snapshots.scheduleSave();
      snapshots.scheduleSave();
      snapshots.scheduleSave();

      jest.advanceTimersByTime(50);

      expect(saveNow).toHaveBeenCalledTimes(1);
      await snapshots.flush();
    } finally {
      jest.useRealTimers();
    }
  });

  it('rejects with PersistenceError when the target cannot be written', async () => {
    await mkdir(join(dir, 'latest_data.json.tmp'));

    await expect(snapshots.saveNow()).rejects.toBeInstanceOf(PersistenceError);
  });
});
