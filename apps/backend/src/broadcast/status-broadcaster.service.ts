import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject } from 'rxjs';

import { StatusBroadcastMessage } from './broadcast.types';
import { encodeStatusMessage } from './status-broadcast.codec';
import { ConfigurationError } from '../errors/engine-errors';
import { MeshTransport } from '../mesh/mesh-transport';
import { BROADCAST_DESTINATION } from '../mesh/mesh.types';
import { ChangeSet, NodeState } from '../nodes/nodes.types';
import { isHelpActive, NodesService } from '../nodes/nodes.service';
import { DerivedStatusService } from '../status/derived-status.service';
import { TaskQueue } from '../utils/task-queue';

export type BroadcastTrigger =
  | 'heartbeat'
  | 'status-change'
  | 'help-requested'
  | 'help-cleared'
  | 'help-expired';

interface SentSummary {
  color: string;
  reasons: string;
  helpRequested: boolean;
}

/**
 * Announces the local node's health on the shared channel: a fixed heartbeat plus an immediate
 * send whenever color, reasons or the help flag change. Every send re-arms the heartbeat.
 */
@Injectable()
export class StatusBroadcasterService implements OnModuleDestroy {
  private readonly logger = new Logger(StatusBroadcasterService.name);
  private readonly localChanges$ = new Subject<ChangeSet>();
  private readonly sendQueue = new TaskQueue(1);
  private readonly enabled: boolean;
  private readonly localNodeId: string | null;
  private readonly heartbeatMs: number;
  private readonly initialDelayMs: number;
  private readonly helpAutoClearMs: number;
  private readonly version: string;

  private heartbeatTimer?: NodeJS.Timeout;
  private helpTimer?: NodeJS.Timeout;
  private running = false;
  /** Summary of the last message built for sending; changes are measured against it. */
  private baseline: SentSummary | null = null;

  constructor(
    configService: ConfigService,
    private readonly transport: MeshTransport,
    private readonly nodesService: NodesService,
    private readonly derivedStatus: DerivedStatusService,
  ) {
    this.enabled = configService.get<boolean>('broadcast.enabled', true);
    this.localNodeId = configService.get<string>('mesh.localNodeId') ?? null;
    this.heartbeatMs = configService.get<number>('broadcast.heartbeatSeconds', 900) * 1000;
    this.initialDelayMs = configService.get<number>('broadcast.initialDelaySeconds', 30) * 1000;
    this.helpAutoClearMs = configService.get<number>('broadcast.helpAutoClearSeconds', 3600) * 1000;
    this.version = configService.get<string>('broadcast.version', '1.3.0');
  }

  /** Help flag changes made here, including auto-clear, for the facade to publish. */
  getLocalChangesStream(): Observable<ChangeSet> {
    return this.localChanges$.asObservable();
  }

  start(): void {
    if (this.running) {
      return;
    }
    if (!this.enabled || !this.localNodeId) {
      this.logger.log(
        this.enabled
          ? 'Status broadcasts disabled: MESH_LOCAL_NODE_ID is not set'
          : 'Status broadcasts disabled by configuration',
      );
      return;
    }
    this.running = true;
    this.baseline = this.summarize(this.buildMessage());
    this.armHeartbeat(this.initialDelayMs);

    const local = this.nodesService.get(this.localNodeId);
    if (local && isHelpActive(local) && local.helpRequestedAt !== null) {
      this.armHelpExpiry(local.helpRequestedAt + this.helpAutoClearMs - Date.now());
    }
    this.logger.log(`Status broadcasts started for ${this.localNodeId}`);
  }

  /** Stops the timers and waits for a send already in flight. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    if (this.helpTimer) {
      clearTimeout(this.helpTimer);
      this.helpTimer = undefined;
    }
    await this.sendQueue.onIdle();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
    this.localChanges$.complete();
  }

  isHelpRequested(): boolean {
    const local = this.localNodeId ? this.nodesService.get(this.localNodeId) : undefined;
    return local !== undefined && isHelpActive(local);
  }

  requestHelp(now = Date.now()): ChangeSet {
    const localNodeId = this.requireLocalNodeId();
    const change = this.nodesService.applyHelpFlag({ nodeId: localNodeId, requested: true, at: now });
    this.armHelpExpiry(this.helpAutoClearMs);
    this.logger.warn('Help requested');
    this.publishLocal(change);
    this.queueSend('help-requested');
    return change;
  }

  clearHelp(now = Date.now()): ChangeSet {
    return this.releaseHelp('help-cleared', now);
  }

  /**
   * Called by the facade after every local status recomputation. A change counts against the
   * last message built for sending, whether or not that send reached the mesh.
   */
  notifyLocalStatus(): void {
    if (!this.running) {
      return;
    }
    const summary = this.summarize(this.buildMessage());
    if (
      !this.baseline ||
      summary.color !== this.baseline.color ||
      summary.reasons !== this.baseline.reasons ||
      summary.helpRequested !== this.baseline.helpRequested
    ) {
      this.baseline = summary;
      this.queueSend('status-change');
    }
  }

  buildMessage(now = Date.now()): StatusBroadcastMessage {
    const localNodeId = this.requireLocalNodeId();
    const local: NodeState | undefined = this.nodesService.get(localNodeId);
    const status = local ? this.derivedStatus.calculate(local, now) : null;
    return {
      nodeId: localNodeId,
      color: status?.healthColor ?? 'GREEN',
      reasons: status?.reasons ?? [],
      helpRequested: local !== undefined && isHelpActive(local),
      version: this.version,
      timestamp: Math.floor(now / 1000),
    };
  }

  private releaseHelp(trigger: 'help-cleared' | 'help-expired', now: number): ChangeSet {
    const localNodeId = this.requireLocalNodeId();
    if (this.helpTimer) {
      clearTimeout(this.helpTimer);
      this.helpTimer = undefined;
    }
    const change = this.nodesService.applyHelpFlag({ nodeId: localNodeId, requested: false, at: now });
    if (change.nodeIds.length === 0) {
      return change;
    }
    this.logger.log(trigger === 'help-expired' ? 'Help request expired' : 'Help request cleared');
    this.publishLocal(change);
    this.queueSend(trigger);
    return change;
  }

  private armHelpExpiry(delayMs: number): void {
    if (this.helpTimer) {
      clearTimeout(this.helpTimer);
    }
    this.helpTimer = setTimeout(() => {
      this.helpTimer = undefined;
      this.releaseHelp('help-expired', Date.now());
    }, Math.max(0, delayMs));
  }

  private armHeartbeat(delayMs: number): void {
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
    }
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = undefined;
      this.queueSend('heartbeat');
    }, delayMs);
  }

  private queueSend(trigger: BroadcastTrigger): void {
    if (!this.running) {
      return;
    }
    // Any send restarts the heartbeat countdown.
    this.armHeartbeat(this.heartbeatMs);
    void this.sendQueue.add(() => this.send(trigger));
  }

  private async send(trigger: BroadcastTrigger): Promise<void> {
    if (!this.running) {
      return;
    }
    try {
      const message = this.buildMessage();
      this.baseline = this.summarize(message);
      const text = encodeStatusMessage(message);
      await this.transport.send(BROADCAST_DESTINATION, text, false);
      this.logger.log(`Status broadcast (${trigger}): ${text}`);
    } catch (error) {
      this.logger.warn(
        `Status broadcast (${trigger}) failed: ${error instanceof Error ? error.message : error}`,
      );
    }
  }

  private summarize(message: StatusBroadcastMessage): SentSummary {
    return {
      color: message.color,
      reasons: [...message.reasons].sort().join(','),
      helpRequested: message.helpRequested,
    };
  }

  private publishLocal(change: ChangeSet): void {
    if (change.nodeIds.length > 0) {
      this.localChanges$.next(change);
    }
  }

  private requireLocalNodeId(): string {
    if (!this.localNodeId) {
      throw new ConfigurationError(['MESH_LOCAL_NODE_ID is not configured']);
    }
    return this.localNodeId;
  }
}
