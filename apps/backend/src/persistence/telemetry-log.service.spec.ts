import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { currentScaleFactor, voltageToPercent } from './battery-curve';
import {
  dayFileSegments,
  escapeCsvValue,
  TELEMETRY_LOG_COLUMNS,
  TelemetryLogService,
} from './telemetry-log.service';
import { NodeState } from '../nodes/nodes.types';
import { createNodeState } from '../nodes/nodes.service';
import { TelemetryRecord } from '../packets/packet.types';
import { createTestConfigService, EngineConfigOverrides } from '../testing/test-config';

const NODE = '!0000beef';
// 2023-11-14T22:13:20Z
const T = 1_700_000_000_000;
const DAY_MS = 24 * 60 * 60 * 1000;

const node: NodeState = { ...createNodeState(NODE), longName: 'Ridge, North', shortName: 'RDG', hopLimit: 2 };

function powerRecord(receivedAt: number): TelemetryRecord {
  return {
    kind: 'telemetry',
    nodeId: NODE,
    receivedAt,
    origin: 'live',
    group: 'power',
    values: { voltage_external: 13.1, current_raw: 120 },
    hopsAway: 2,
  };
}

describe('battery curve', () => {
  it('interpolates and clamps LiFePO4 voltage', () => {
    expect(voltageToPercent(9)).toBe(0);
    expect(voltageToPercent(11.5)).toBe(8);
    expect(voltageToPercent(13.1)).toBe(60);
    expect(voltageToPercent(14)).toBe(100);
  });

  it('derives the shunt correction factor', () => {
    expect(currentScaleFactor(350, 3.5)).toBe(1);
    expect(currentScaleFactor(75, 1.5)).toBe(2);
    expect(currentScaleFactor(75, 0)).toBe(1);
  });
});

describe('TelemetryLogService', () => {
  let dir: string;

  const createService = (overrides: EngineConfigOverrides = {}) =>
    new TelemetryLogService(
      createTestConfigService({ ...overrides, persistence: { dataDir: dir, logDir: 'logs', retainDays: 30 } }),
    );

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'telemetry-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names day files by UTC date', () => {
    expect(dayFileSegments(T)).toEqual(['2023', '20231114.csv']);
  });

  it('quotes values that contain separators', () => {
    expect(escapeCsvValue('Ridge, North')).toBe('"Ridge, North"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue(null)).toBe('');
  });

  it('writes a header once and one row per record', async () => {
    const service = createService();

    service.record(powerRecord(T), node);
    service.record({ kind: 'motion', nodeId: NODE, receivedAt: T + 1_000, origin: 'live' }, node);
    await service.flush();

    const contents = await readFile(join(dir, 'logs', '0000beef', '2023', '20231114.csv'), 'utf-8');
    expect(contents.split('\n')).toEqual([
      TELEMETRY_LOG_COLUMNS.join(','),
      '1,2023-11-14T22:13:20Z,1700000000,!0000beef,"Ridge, North",RDG,Power,,2,,,,,13.1,60,120,120,,,,,0',
      '1,2023-11-14T22:13:21Z,1700000001,!0000beef,"Ridge, North",RDG,Motion,,2,,,,,,,,,,,,,1',
      '',
    ]);
  });

  it('scales the current when a sensor is configured', () => {
    const service = createService({ currentSensor: { enabled: true, fullScaleMv: 75, fullScaleA: 1.5 } });

    expect(service.buildRow(powerRecord(T), node)).toMatchObject({ current_raw: 120, current_scaled: 240 });
  });

  it('keeps writing after a row fails', async () => {
    const service = createService();
    const blocked = join(dir, 'logs', '0000beef', '2023');
    await mkdir(join(dir, 'logs', '0000beef'), { recursive: true });
    await writeFile(blocked, 'not a directory', 'utf-8');

    service.record(powerRecord(T), node);
    service.record(powerRecord(Date.UTC(2024, 0, 2)), node);
    await service.flush();

    const contents = await readFile(join(dir, 'logs', '0000beef', '2024', '20240102.csv'), 'utf-8');
    expect(contents.split('\n')).toHaveLength(3);
  });

  it('removes day files past the retention window', async () => {
    const service = createService();
    service.record(powerRecord(T - 31 * DAY_MS), node);
    service.record(powerRecord(T - 29 * DAY_MS), node);
    await service.flush();

    await expect(service.cleanup(T)).resolves.toBe(1);
    expect(await readdir(join(dir, 'logs', '0000beef', '2023'))).toEqual(['20231016.csv']);
  });

  it('deletes every log of a node', async () => {
    const service = createService();
    service.record(powerRecord(T), node);

    await service.deleteNodeLogs(NODE);

    expect(await readdir(join(dir, 'logs'))).toEqual([]);
  });
});
