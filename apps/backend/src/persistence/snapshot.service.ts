import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';

import { PersistenceError } from '../errors/engine-errors';
import { NodeState } from '../nodes/nodes.types';
import { NodesService } from '../nodes/nodes.service';
import { TELEMETRY_FIELDS } from '../packets/packet.types';
import { HEALTH_COLORS } from '../status/status.types';
import { TaskQueue } from '../utils/task-queue';

export const SNAPSHOT_SCHEMA_VERSION = 1;

const nullableTime = z.number().finite().nullable();

const readingSchema = z.object({ value: z.number().finite(), updatedAt: z.number().finite() });

const nodeStateSchema = z.object({
  id: z.string().min(1),
  shortName: z.string().nullable(),
  longName: z.string().nullable(),
  lastHeard: nullableTime,
  telemetry: z.record(z.enum(TELEMETRY_FIELDS), readingSchema),
  lastMotionAt: nullableTime,
  remoteStatus: z
    .object({
      color: z.enum(HEALTH_COLORS),
      reasons: z.array(z.string()),
      helpRequested: z.boolean(),
      version: z.string(),
      reportedAt: z.number().finite(),
      receivedAt: z.number().finite(),
    })
    .nullable(),
  helpRequestedAt: nullableTime,
  helpCleared: z.boolean(),
  lastPacketKind: z.string().nullable(),
  hopLimit: z.number().int().nullable(),
  lastMessageAt: nullableTime,
});

const snapshotSchema = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  savedAt: z.string(),
  nodes: z.array(nodeStateSchema),
});

export type SnapshotDocument = z.infer<typeof snapshotSchema>;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Whole-store JSON snapshot. Saves are coalesced within the debounce window and always go
 * through a temp file plus rename, so the file on disk is either the old or the new document.
 */
@Injectable()
export class SnapshotService implements OnModuleDestroy {
  private readonly logger = new Logger(SnapshotService.name);
  private readonly snapshotPath: string;
  private readonly debounceMs: number;
  private readonly writeQueue = new TaskQueue(1);
  private saveTimer?: NodeJS.Timeout;

  constructor(
    configService: ConfigService,
    private readonly nodesService: NodesService,
  ) {
    this.snapshotPath = join(
      configService.get<string>('persistence.dataDir', 'data'),
      configService.get<string>('persistence.snapshotFile', 'latest_data.json'),
    );
    this.debounceMs = configService.get<number>('persistence.snapshotDebounceMs', 2000);
  }

  get path(): string {
    return this.snapshotPath;
  }

  /** Reads the snapshot once at startup. A missing or invalid file yields an empty list. */
  async load(): Promise<NodeState[]> {
    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.log(`No snapshot at ${this.snapshotPath}; starting empty`);
        return [];
      }
      this.logger.error(new PersistenceError('snapshot-load', this.snapshotPath, error).message);
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        `Snapshot ${this.snapshotPath} is not valid JSON: ${error instanceof Error ? error.message : error}`,
      );
      return [];
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        `Snapshot ${this.snapshotPath} failed validation: ${parsed.error.issues
          .slice(0, 5)
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ')}`,
      );
      return [];
    }
    this.logger.log(`Loaded ${parsed.data.nodes.length} nodes from ${this.snapshotPath}`);
    return parsed.data.nodes;
  }

  scheduleSave(): void {
    if (this.saveTimer) {
      return;
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = undefined;
      this.saveNow().catch((error) => {
        this.logger.error(error instanceof Error ? error.message : String(error));
        this.scheduleSave();
      });
    }, this.debounceMs);
  }

  /** Writes the current store immediately; rejects with `PersistenceError`. */
  saveNow(): Promise<void> {
    return this.writeQueue.add(async () => {
      const document: SnapshotDocument = {
        schemaVersion: SNAPSHOT_SCHEMA_VERSION,
        savedAt: new Date().toISOString(),
        nodes: this.nodesService.list(),
      };
      const tempPath = `${this.snapshotPath}.tmp`;
      try {
        await mkdir(dirname(this.snapshotPath), { recursive: true });
        await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
        await rename(tempPath, this.snapshotPath);
        this.logger.debug(`Saved ${document.nodes.length} nodes to ${this.snapshotPath}`);
      } catch (error) {
        throw new PersistenceError('snapshot-save', this.snapshotPath, error);
      }
    });
  }

  /** Cancels a pending debounced save and writes once more. */
  async flush(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = undefined;
    }
    try {
      await this.saveNow();
    } catch (error) {
      this.logger.error(error instanceof Error ? error.message : String(error));
    }
  }

  onModuleDestroy(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = undefined;
    }
  }
}
