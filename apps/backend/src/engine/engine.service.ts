import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject, Subscription } from 'rxjs';

import {
  AlertListener,
  ChangeListener,
  EngineStatus,
  ForgetNodeOptions,
  ForgetNodeResult,
  NodeView,
} from './engine.types';
import { AlertEngineService } from '../alert-rules/alert-engine.service';
import { AlertEvent, NodeEvaluation } from '../alert-rules/alert-rules.types';
import { StatusBroadcasterService } from '../broadcast/status-broadcaster.service';
import { StatusReceiverService } from '../broadcast/status-receiver.service';
import {
  DecodeError,
  ForbiddenOperationError,
  NormalizationError,
  PersistenceError,
  TransportError,
  UnknownNodeError,
} from '../errors/engine-errors';
import { MeshTransport } from '../mesh/mesh-transport';
import { BROADCAST_DESTINATION, MeshConnectionState, RawMeshEvent } from '../mesh/mesh.types';
import { formatReadReceipt, TELEMETRY_REQUEST_TEXT } from '../messages/message-protocol';
import { MarkReadResult, MeshMessage } from '../messages/messages.types';
import { MessagesService } from '../messages/messages.service';
import { ChangeSet } from '../nodes/nodes.types';
import { NodesService } from '../nodes/nodes.service';
import { normalizeNodeId } from '../packets/node-id';
import { NormalizedRecord } from '../packets/packet.types';
import { PacketNormalizer } from '../packets/packet-normalizer';
import { SnapshotService } from '../persistence/snapshot.service';
import { TelemetryLogService } from '../persistence/telemetry-log.service';
import { RefreshSchedulerService, RefreshTick } from '../scheduler/refresh-scheduler.service';
import { DerivedStatusService } from '../status/derived-status.service';
import { TaskQueue } from '../utils/task-queue';

const RECONNECT_DELAY_MS = 30_000;
const INGEST_HIGH_WATER_MARK = 500;
const BACKLOG_WARNING_INTERVAL_MS = 5_000;

/**
 * Composition root of the telemetry engine. Transport events pass through a concurrency-1
 * queue, so every store mutation and the evaluations that follow it run to completion before
 * the next packet is looked at.
 */
@Injectable()
export class EngineService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(EngineService.name);
  private readonly changesSubject = new Subject<ChangeSet>();
  private readonly alertsSubject = new Subject<AlertEvent>();
  private readonly ingestQueue = new TaskQueue(1);
  private readonly lastEvaluations = new Map<string, NodeEvaluation>();
  private readonly localNodeId: string | null;
  private readonly subscriptions: Subscription[] = [];
  private removePacketListener?: () => void;
  private reconnectTimer?: NodeJS.Timeout;
  private lastBacklogWarning = 0;
  private started = false;

  readonly changes$: Observable<ChangeSet> = this.changesSubject.asObservable();
  readonly alerts$: Observable<AlertEvent> = this.alertsSubject.asObservable();

  constructor(
    configService: ConfigService,
    private readonly transport: MeshTransport,
    private readonly normalizer: PacketNormalizer,
    private readonly nodesService: NodesService,
    private readonly derivedStatus: DerivedStatusService,
    private readonly alertEngine: AlertEngineService,
    private readonly broadcaster: StatusBroadcasterService,
    private readonly receiver: StatusReceiverService,
    private readonly messagesService: MessagesService,
    private readonly snapshotService: SnapshotService,
    private readonly telemetryLog: TelemetryLogService,
    private readonly scheduler: RefreshSchedulerService,
  ) {
    this.localNodeId = configService.get<string>('mesh.localNodeId') ?? null;
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  async start(now = Date.now()): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    const restored = this.nodesService.restore(await this.snapshotService.load());
    restored.nodeIds.forEach((nodeId) => {
      const node = this.nodesService.get(nodeId);
      if (node) {
        const status = this.derivedStatus.calculate(node, now);
        this.derivedStatus.update(nodeId, status);
        this.lastEvaluations.set(nodeId, { node, status, evaluatedAt: now });
      }
    });
    this.alertEngine.markStarted(now);

    this.subscriptions.push(
      this.scheduler.getTickStream().subscribe((tick) => this.handleTick(tick)),
      this.broadcaster.getLocalChangesStream().subscribe((change) => this.handleLocalChange(change)),
    );
    this.removePacketListener = this.transport.onPacket((event) => {
      void this.enqueue(event);
    });
    if (restored.nodeIds.length > 0) {
      this.changesSubject.next(restored);
    }

    await this.connectTransport();
    this.scheduler.start();
    this.broadcaster.start();
    this.logger.log(`Telemetry engine started with ${restored.nodeIds.length} restored nodes`);
  }

  /** Stops timers, drains queued packets and writes the final snapshot. */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.scheduler.stop();
    await this.broadcaster.stop();
    this.removePacketListener?.();
    this.removePacketListener = undefined;
    await this.ingestQueue.onIdle();

    try {
      await this.transport.disconnect();
    } catch (error) {
      this.logger.warn(
        `Mesh transport disconnect failed: ${error instanceof Error ? error.message : error}`,
      );
    }
    await this.telemetryLog.flush();
    await this.snapshotService.flush();
    await this.messagesService.flush();

    this.subscriptions.splice(0).forEach((subscription) => subscription.unsubscribe());
    this.logger.log('Telemetry engine stopped');
  }

  subscribeChanges(listener: ChangeListener): () => void {
    const subscription = this.changes$.subscribe(listener);
    return () => subscription.unsubscribe();
  }

  subscribeAlerts(listener: AlertListener): () => void {
    const subscription = this.alerts$.subscribe(listener);
    return () => subscription.unsubscribe();
  }

  /** Resolves once the event and everything queued before it has been applied; never rejects. */
  enqueue(event: RawMeshEvent): Promise<void> {
    const backlog = this.ingestQueue.size;
    if (backlog > INGEST_HIGH_WATER_MARK) {
      const now = Date.now();
      if (now - this.lastBacklogWarning > BACKLOG_WARNING_INTERVAL_MS) {
        this.logger.warn(`Ingest backlog at ${backlog} packets`);
        this.lastBacklogWarning = now;
      }
    }
    return this.ingestQueue.add(async () => {
      try {
        this.ingest(event);
      } catch (error) {
        this.logger.error(
          `Failed to ingest packet: ${error instanceof Error ? error.message : error}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
    });
  }

  listNodes(now = Date.now()): NodeView[] {
    return this.nodesService
      .list()
      .sort((a, b) => (b.lastHeard ?? 0) - (a.lastHeard ?? 0))
      .map((state) => ({
        state,
        status: this.derivedStatus.calculate(state, now),
        alerts: this.alertEngine.getActiveAlerts(state.id),
      }));
  }

  /** Views of the named nodes that still exist, in the order given. */
  describeNodes(nodeIds: string[], now = Date.now()): NodeView[] {
    return nodeIds.flatMap((nodeId) => {
      const state = this.nodesService.get(nodeId);
      return state
        ? [
            {
              state,
              status: this.derivedStatus.calculate(state, now),
              alerts: this.alertEngine.getActiveAlerts(nodeId),
            },
          ]
        : [];
    });
  }

  getNode(nodeId: string, now = Date.now()): NodeView {
    const state = this.nodesService.get(this.requireNodeId(nodeId));
    if (!state) {
      throw new UnknownNodeError(nodeId);
    }
    return {
      state,
      status: this.derivedStatus.calculate(state, now),
      alerts: this.alertEngine.getActiveAlerts(state.id),
    };
  }

  getStatus(now = Date.now()): EngineStatus {
    const local = this.localNodeId ? this.nodesService.get(this.localNodeId) : undefined;
    return {
      connection: this.transport.connectionState(),
      localNodeId: this.localNodeId,
      local: local
        ? {
            state: local,
            status: this.derivedStatus.calculate(local, now),
            alerts: this.alertEngine.getActiveAlerts(local.id),
          }
        : null,
      helpRequested: this.broadcaster.isHelpRequested(),
      nodeCount: this.nodesService.snapshot().size,
      activeAlerts: this.alertEngine.getActiveAlerts().length,
      unreadMessages: this.messagesService.listUnread().length,
    };
  }

  connectionState(): MeshConnectionState {
    return this.transport.connectionState();
  }

  getActiveAlerts(nodeId?: string): AlertEvent[] {
    return this.alertEngine.getActiveAlerts(nodeId);
  }

  listMessages(nodeId?: string): MeshMessage[] {
    return this.messagesService.list(nodeId);
  }

  listUnreadMessages(): MeshMessage[] {
    return this.messagesService.listUnread();
  }

  /**
   * Marks a received message read and, when it carried a message tag, sends `[RECEIPT:<id>]`
   * back to its sender. A receipt that cannot be sent leaves the message read.
   */
  async markMessageRead(messageId: string, now = Date.now()): Promise<MarkReadResult> {
    const previous = this.messagesService.get(messageId);
    const message = this.messagesService.markRead(messageId, now);
    if (!message.structured || previous?.readAt !== null) {
      return { message, receiptSent: false };
    }
    try {
      await this.transport.send(message.from, formatReadReceipt(message.id), false);
      return { message, receiptSent: true };
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.logger.warn(`Read receipt for ${message.id} not sent: ${error.message}`);
      return { message, receiptSent: false };
    }
  }

  /**
   * Removes every trace of a node in one synchronous turn: store entry, motion cache, active
   * alerts, published status and messages. Observers see a single change set naming it removed.
   * Deleting the logs comes after; a failure there is logged and reported as `logsDeleted: false`.
   */
  async forgetNode(nodeId: string, options: ForgetNodeOptions = {}): Promise<ForgetNodeResult> {
    const id = this.requireNodeId(nodeId);
    if (id === this.localNodeId) {
      throw new ForbiddenOperationError('The local node cannot be forgotten');
    }

    const result = this.nodesService.forget(id);
    if (!result.removed) {
      throw new UnknownNodeError(id);
    }
    let clearedAlerts = 0;
    result.dependentCaches.forEach((cache) => {
      switch (cache) {
        case 'alerts':
          clearedAlerts = this.alertEngine.clearNode(id).length;
          this.lastEvaluations.delete(id);
          break;
        case 'published-status':
          this.derivedStatus.forget(id);
          break;
        case 'messages':
          this.messagesService.forget(id);
          break;
        case 'remote-status':
          // Held on the removed NodeState itself.
          break;
      }
    });
    this.changesSubject.next({ nodeIds: [], removed: [id], reason: 'forget' });
    this.snapshotService.scheduleSave();

    let logsDeleted = false;
    if (options.deleteLogs) {
      try {
        await this.telemetryLog.deleteNodeLogs(id);
        logsDeleted = true;
      } catch (error) {
        if (!(error instanceof PersistenceError)) {
          throw error;
        }
        this.logger.error(`Telemetry logs for ${id} were kept: ${error.message}`);
      }
    }
    this.logger.log(`Node ${id} forgotten${logsDeleted ? ' with its telemetry logs' : ''}`);
    return { nodeId: id, clearedAlerts, logsDeleted };
  }

  /** Sends a text to a node or to `^all`; rejects with `TransportError` when the link is down. */
  async requestSend(
    destination: string,
    text: string,
    wantAck = false,
    now = Date.now(),
  ): Promise<MeshMessage> {
    const target = destination === BROADCAST_DESTINATION ? destination : this.requireNodeId(destination);
    const outgoing = this.messagesService.prepareOutgoing(target, text, now);
    await this.transport.send(target, outgoing.payload, wantAck);
    this.messagesService.recordSent(outgoing.message);
    return outgoing.message;
  }

  async requestTelemetry(nodeId: string): Promise<void> {
    const id = this.requireNodeId(nodeId);
    if (!this.nodesService.get(id)) {
      throw new UnknownNodeError(id);
    }
    await this.transport.send(id, TELEMETRY_REQUEST_TEXT, true);
    this.logger.log(`Requested telemetry from ${id}`);
  }

  requestHelp(now = Date.now()): ChangeSet {
    return this.broadcaster.requestHelp(now);
  }

  clearHelp(now = Date.now()): ChangeSet {
    return this.broadcaster.clearHelp(now);
  }

  private ingest(event: RawMeshEvent): void {
    let record: NormalizedRecord;
    try {
      record = this.normalizer.normalize(event);
    } catch (error) {
      if (error instanceof NormalizationError || error instanceof DecodeError) {
        this.logger.warn(error.message);
        return;
      }
      throw error;
    }

    const change = this.apply(record);
    if (change.nodeIds.length === 0) {
      return;
    }
    this.snapshotService.scheduleSave();
    this.evaluate(change.nodeIds, Date.now());
    this.changesSubject.next(change);
  }

  private apply(record: NormalizedRecord): ChangeSet {
    switch (record.kind) {
      case 'status-broadcast':
        return this.receiver.receive(record);
      case 'text': {
        const change = this.nodesService.apply(record);
        if (record.origin === 'live') {
          this.messagesService.recordIncoming(record);
        }
        return change;
      }
      case 'telemetry':
      case 'motion': {
        const change = this.nodesService.apply(record);
        if (record.origin === 'live') {
          this.telemetryLog.record(record, this.nodesService.get(record.nodeId));
        }
        return change;
      }
      default:
        return this.nodesService.apply(record);
    }
  }

  private evaluate(nodeIds: string[], now: number): void {
    nodeIds.forEach((nodeId) => {
      const node = this.nodesService.get(nodeId);
      if (!node) {
        return;
      }
      const status = this.derivedStatus.calculate(node, now);
      this.derivedStatus.update(nodeId, status);
      this.raiseAlerts(nodeId, { node, status, evaluatedAt: now });
    });
    if (this.localNodeId && nodeIds.includes(this.localNodeId)) {
      this.broadcaster.notifyLocalStatus();
    }
  }

  private raiseAlerts(nodeId: string, evaluation: NodeEvaluation): void {
    const events = this.alertEngine.evaluate(nodeId, this.lastEvaluations.get(nodeId), evaluation);
    this.lastEvaluations.set(nodeId, evaluation);
    events.forEach((event) => this.alertsSubject.next(event));
  }

  private handleTick(tick: RefreshTick): void {
    tick.nodes.forEach((node, nodeId) => {
      const status = tick.statuses.get(nodeId);
      if (status) {
        this.raiseAlerts(nodeId, { node, status, evaluatedAt: tick.now });
      }
    });
    if (this.localNodeId && tick.changes.nodeIds.includes(this.localNodeId)) {
      this.broadcaster.notifyLocalStatus();
    }
    if (tick.changes.nodeIds.length > 0) {
      this.changesSubject.next(tick.changes);
    }
  }

  private handleLocalChange(change: ChangeSet): void {
    this.snapshotService.scheduleSave();
    this.changesSubject.next(change);
  }

  private async connectTransport(): Promise<void> {
    try {
      await this.transport.connect();
    } catch (error) {
      this.logger.error(
        `Mesh transport unavailable, retrying in ${RECONNECT_DELAY_MS / 1000}s: ${
          error instanceof Error ? error.message : error
        }`,
      );
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = undefined;
        if (this.started) {
          void this.connectTransport();
        }
      }, RECONNECT_DELAY_MS);
    }
  }

  private requireNodeId(nodeId: string): string {
    const id = normalizeNodeId(nodeId);
    if (!id) {
      throw new UnknownNodeError(nodeId);
    }
    return id;
  }
}
