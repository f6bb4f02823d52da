import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'node:fs';
import { appendFile, mkdir, readdir, rm, stat, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { currentScaleFactor, voltageToPercent } from './battery-curve';
import { PersistenceError } from '../errors/engine-errors';
import { NodeState } from '../nodes/nodes.types';
import { nodeIdPathSegment } from '../packets/node-id';
import { MotionRecord, TelemetryGroup, TelemetryRecord } from '../packets/packet.types';
import { TaskQueue } from '../utils/task-queue';

export const TELEMETRY_LOG_SCHEMA_VERSION = 1;

export const TELEMETRY_LOG_COLUMNS = [
  'schema_version',
  'iso_time',
  'epoch',
  'node_id',
  'long_name',
  'short_name',
  'message_type',
  'snr',
  'hop',
  'temperature',
  'humidity',
  'pressure',
  'voltage_internal',
  'voltage_external',
  'voltage_external_percent',
  'current_raw',
  'current_scaled',
  'battery_level',
  'channel_utilization',
  'air_util_tx',
  'uptime',
  'motion_detected',
] as const;

export type TelemetryLogColumn = (typeof TELEMETRY_LOG_COLUMNS)[number];

export type TelemetryLogRow = Partial<Record<TelemetryLogColumn, string | number | null>>;

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_FILE_PATTERN = /^(\d{4})(\d{2})(\d{2})\.csv$/;

const MESSAGE_TYPES: Record<TelemetryGroup, string> = {
  device: 'Device',
  environment: 'Environment',
  power: 'Power',
  mixed: 'Telemetry',
};

export function escapeCsvValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const stringValue = typeof value === 'number' ? String(value) : value;
  if (/[",\r\n]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}

export function formatCsvLine(row: TelemetryLogRow): string {
  return `${TELEMETRY_LOG_COLUMNS.map((column) => escapeCsvValue(row[column])).join(',')}\n`;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** `<year>/<YYYYMMDD>.csv`, by UTC date. */
export function dayFileSegments(epochMs: number): [string, string] {
  const date = new Date(epochMs);
  const year = String(date.getUTCFullYear());
  return [year, `${year}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}.csv`];
}

/**
 * Append-only CSV history, one file per node per UTC day. Rows are written strictly in the order
 * they were queued; a failed row is logged and the writer moves on to the next one.
 */
@Injectable()
export class TelemetryLogService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelemetryLogService.name);
  private readonly logRoot: string;
  private readonly retainDays: number;
  private readonly currentScale: number;
  private readonly writeQueue = new TaskQueue(1);
  private cleanupTimer?: NodeJS.Timeout;

  constructor(configService: ConfigService) {
    this.logRoot = join(
      configService.get<string>('persistence.dataDir', 'data'),
      configService.get<string>('persistence.logDir', 'logs'),
    );
    this.retainDays = configService.get<number>('persistence.retainDays', 30);
    this.currentScale = configService.get<boolean>('currentSensor.enabled', false)
      ? currentScaleFactor(
          configService.get<number>('currentSensor.fullScaleMv', 350),
          configService.get<number>('currentSensor.fullScaleA', 3.5),
        )
      : 1;
  }

  onModuleInit(): void {
    this.cleanupTimer = setInterval(() => {
      void this.cleanup();
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  onModuleDestroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  get root(): string {
    return this.logRoot;
  }

  filePath(nodeId: string, epochMs: number): string {
    return join(this.logRoot, nodeIdPathSegment(nodeId), ...dayFileSegments(epochMs));
  }

  buildRow(record: TelemetryRecord | MotionRecord, node: NodeState | undefined): TelemetryLogRow {
    const epoch = Math.floor(record.receivedAt / 1000);
    const row: TelemetryLogRow = {
      schema_version: TELEMETRY_LOG_SCHEMA_VERSION,
      iso_time: new Date(epoch * 1000).toISOString().replace('.000Z', 'Z'),
      epoch,
      node_id: record.nodeId,
      long_name: node?.longName ?? '',
      short_name: node?.shortName ?? '',
      motion_detected: record.kind === 'motion' ? 1 : 0,
    };
    if (record.kind === 'motion') {
      return { ...row, message_type: 'Motion', hop: node?.hopLimit ?? null };
    }

    const { values } = record;
    const currentRaw = values.current_raw;
    return {
      ...row,
      message_type: MESSAGE_TYPES[record.group],
      snr: values.snr ?? null,
      hop: record.hopsAway,
      temperature: values.temperature ?? null,
      humidity: values.humidity ?? null,
      pressure: values.pressure ?? null,
      voltage_internal: values.voltage_internal ?? null,
      voltage_external: values.voltage_external ?? null,
      voltage_external_percent:
        values.voltage_external === undefined ? null : voltageToPercent(values.voltage_external),
      current_raw: currentRaw ?? null,
      current_scaled:
        currentRaw === undefined ? null : Math.round(currentRaw * this.currentScale * 100) / 100,
      battery_level: values.battery_level ?? null,
      channel_utilization: values.channel_utilization ?? null,
      air_util_tx: values.air_util_tx ?? null,
      uptime: values.uptime ?? null,
    };
  }

  /** Queues one row; never throws. */
  record(record: TelemetryRecord | MotionRecord, node: NodeState | undefined): void {
    const row = this.buildRow(record, node);
    const path = this.filePath(record.nodeId, record.receivedAt);
    void this.writeQueue
      .add(() => this.appendRow(path, row))
      .catch((error) => {
        this.logger.warn(error instanceof Error ? error.message : String(error));
      });
  }

  /** Resolves once every queued row has been written or dropped. */
  flush(): Promise<void> {
    return this.writeQueue.onIdle();
  }

  async deleteNodeLogs(nodeId: string): Promise<void> {
    const directory = join(this.logRoot, nodeIdPathSegment(nodeId));
    await this.flush();
    try {
      await rm(directory, { recursive: true, force: true });
      this.logger.log(`Deleted telemetry logs for ${nodeId}`);
    } catch (error) {
      throw new PersistenceError('log-delete', directory, error);
    }
  }

  /** Removes day files older than the retention window. Returns the number removed. */
  async cleanup(now = Date.now()): Promise<number> {
    if (!existsSync(this.logRoot)) {
      return 0;
    }
    const cutoff = now - this.retainDays * DAY_MS;
    let removed = 0;
    try {
      for (const nodeDir of await readdir(this.logRoot)) {
        const nodePath = join(this.logRoot, nodeDir);
        if (!(await stat(nodePath)).isDirectory()) {
          continue;
        }
        for (const yearDir of await readdir(nodePath)) {
          const yearPath = join(nodePath, yearDir);
          if (!(await stat(yearPath)).isDirectory()) {
            continue;
          }
          for (const fileName of await readdir(yearPath)) {
            const match = DAY_FILE_PATTERN.exec(fileName);
            if (!match) {
              continue;
            }
            const dayStart = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
            if (dayStart + DAY_MS <= cutoff) {
              await unlink(join(yearPath, fileName));
              removed += 1;
            }
          }
        }
      }
    } catch (error) {
      this.logger.warn(new PersistenceError('log-cleanup', this.logRoot, error).message);
    }
    if (removed > 0) {
      this.logger.log(`Removed ${removed} telemetry log files older than ${this.retainDays} days`);
    }
    return removed;
  }

  private async appendRow(path: string, row: TelemetryLogRow): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      const header = existsSync(path) ? '' : `${TELEMETRY_LOG_COLUMNS.join(',')}\n`;
      await appendFile(path, header + formatCsvLine(row), 'utf-8');
    } catch (error) {
      throw new PersistenceError('log-append', path, error);
    }
  }
}
