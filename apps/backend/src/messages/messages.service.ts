import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Observable, Subject } from 'rxjs';
import { z } from 'zod';

import {
  cleanDisplayText,
  formatOutgoingMessage,
  generateMessageId,
  isBulletin,
  isTelemetryRequest,
  parseProtocolMessage,
  parseReceipt,
} from './message-protocol';
import { MeshMessage, OutgoingMessage } from './messages.types';
import { ForbiddenOperationError, PersistenceError, UnknownMessageError } from '../errors/engine-errors';
import { BROADCAST_DESTINATION } from '../mesh/mesh.types';
import { TextRecord } from '../packets/packet.types';
import { TaskQueue } from '../utils/task-queue';

/** Messages returned per conversation. */
export const MESSAGES_PER_NODE = 10;
export const MAX_STORED_MESSAGES = 500;
export const MESSAGE_RETENTION_DAYS = 90;
export const MESSAGES_SCHEMA_VERSION = 1;

const DAY_MS = 24 * 60 * 60 * 1000;

const messageSchema = z.object({
  id: z.string().min(1),
  direction: z.enum(['received', 'sent']),
  from: z.string().min(1),
  to: z.string().nullable(),
  text: z.string(),
  bulletin: z.boolean(),
  structured: z.boolean(),
  timestamp: z.number().finite(),
  deliveredAt: z.number().finite().nullable(),
  readReceipts: z.record(z.string(), z.number().finite()),
  readAt: z.number().finite().nullable(),
});

const documentSchema = z.object({
  schemaVersion: z.literal(MESSAGES_SCHEMA_VERSION),
  savedAt: z.string(),
  messages: z.array(messageSchema),
});

type MessagesDocument = z.infer<typeof documentSchema>;

/** The node a message belongs to: its sender when received, its target (or `^all`) when sent. */
export function conversationKey(message: MeshMessage): string {
  return message.direction === 'received' ? message.from : (message.to ?? BROADCAST_DESTINATION);
}

/**
 * Text traffic with read state and per-reader receipts. The whole list is kept in a JSON file,
 * trimmed to the newest 500 messages and to 90 days.
 */
@Injectable()
export class MessagesService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MessagesService.name);
  private readonly byId = new Map<string, MeshMessage>();
  private readonly updates$ = new Subject<MeshMessage>();
  private readonly writeQueue = new TaskQueue(1);
  private readonly localNodeId: string | null;
  private readonly messagesPath: string;
  private readonly debounceMs: number;
  private messages: MeshMessage[] = [];
  private saveTimer?: NodeJS.Timeout;

  constructor(configService: ConfigService) {
    this.localNodeId = configService.get<string>('mesh.localNodeId') ?? null;
    this.messagesPath = join(
      configService.get<string>('persistence.dataDir', 'data'),
      configService.get<string>('persistence.messagesFile', 'messages.json'),
    );
    this.debounceMs = configService.get<number>('persistence.snapshotDebounceMs', 2000);
  }

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  onModuleDestroy(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = undefined;
    }
  }

  get path(): string {
    return this.messagesPath;
  }

  getUpdatesStream(): Observable<MeshMessage> {
    return this.updates$.asObservable();
  }

  /** Reads the message file; a missing or invalid file leaves the list empty. */
  async load(now = Date.now()): Promise<void> {
    if (!existsSync(this.messagesPath)) {
      this.logger.log(`No messages file at ${this.messagesPath}; starting empty`);
      return;
    }
    try {
      const parsed = documentSchema.safeParse(JSON.parse(await readFile(this.messagesPath, 'utf-8')));
      if (!parsed.success) {
        this.logger.warn(
          `Ignoring invalid messages file ${this.messagesPath}: ${parsed.error.issues
            .slice(0, 5)
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ')}`,
        );
        return;
      }
      this.replaceAll(parsed.data.messages);
      if (this.applyRetention(now) > 0) {
        this.scheduleSave();
      }
      this.logger.log(`Loaded ${this.messages.length} messages from ${this.messagesPath}`);
    } catch (error) {
      this.logger.error(new PersistenceError('messages-load', this.messagesPath, error).message);
    }
  }

  /** Latest messages of one conversation, oldest first; every stored message without a node. */
  list(nodeId?: string): MeshMessage[] {
    if (nodeId !== undefined) {
      return this.messages.filter((message) => conversationKey(message) === nodeId).slice(-MESSAGES_PER_NODE);
    }
    return [...this.messages].sort((a, b) => a.timestamp - b.timestamp);
  }

  /** Received messages not yet marked read, newest first. */
  listUnread(): MeshMessage[] {
    return this.messages
      .filter((message) => message.direction === 'received' && message.readAt === null)
      .sort((a, b) => b.timestamp - a.timestamp);
  }

  get(messageId: string): MeshMessage | undefined {
    return this.byId.get(messageId);
  }

  /** Stores an incoming text or applies it as a receipt. Returns the affected message. */
  recordIncoming(record: TextRecord): MeshMessage | null {
    const receiptFor = parseReceipt(record.text);
    if (receiptFor !== null) {
      return this.markDelivered(receiptFor, record.nodeId, record.receivedAt);
    }
    if (isTelemetryRequest(record.text)) {
      this.logger.debug(`Telemetry request from ${record.nodeId}`);
      return null;
    }

    const parsed = parseProtocolMessage(record.text);
    const id = parsed?.id ?? `${record.nodeId.slice(1)}_${record.receivedAt}`;
    const existing = this.byId.get(id);
    if (existing) {
      this.logger.debug(`Duplicate message ${id} from ${record.nodeId}`);
      return existing;
    }

    const message: MeshMessage = {
      id,
      direction: 'received',
      from: record.nodeId,
      to: record.destination === BROADCAST_DESTINATION ? null : record.destination,
      text: cleanDisplayText(parsed?.text ?? record.text),
      bulletin: isBulletin(record.destination),
      structured: parsed !== null,
      timestamp: record.receivedAt,
      deliveredAt: null,
      readReceipts: {},
      readAt: null,
    };
    this.store(message);
    this.logger.debug(`Message ${message.id} from ${record.nodeId}`);
    return message;
  }

  prepareOutgoing(destination: string, text: string, now = Date.now()): OutgoingMessage {
    const id = generateMessageId(this.localNodeId, now);
    const to = destination === BROADCAST_DESTINATION ? null : destination;
    return {
      payload: formatOutgoingMessage(text, id),
      message: {
        id,
        direction: 'sent',
        from: this.localNodeId ?? 'unknown',
        to,
        text,
        bulletin: isBulletin(to),
        structured: true,
        timestamp: now,
        deliveredAt: null,
        readReceipts: {},
        readAt: null,
      },
    };
  }

  recordSent(message: MeshMessage): void {
    this.store(message);
  }

  /** Records that `reader` has read one of our messages. The first receipt also marks it delivered. */
  markDelivered(messageId: string, reader: string, at: number): MeshMessage | null {
    const message = this.byId.get(messageId);
    if (!message || message.direction !== 'sent') {
      this.logger.debug(`Receipt from ${reader} for unknown message ${messageId}`);
      return null;
    }
    if (message.readReceipts[reader] !== undefined) {
      return message;
    }
    const updated: MeshMessage = {
      ...message,
      deliveredAt: message.deliveredAt ?? at,
      readReceipts: { ...message.readReceipts, [reader]: at },
    };
    this.replace(updated);
    this.logger.log(`Message ${messageId} read by ${reader}`);
    return updated;
  }

  /** Marks a received message read here; repeating it keeps the first read time. */
  markRead(messageId: string, at: number): MeshMessage {
    const message = this.byId.get(messageId);
    if (!message) {
      throw new UnknownMessageError(messageId);
    }
    if (message.direction !== 'received') {
      throw new ForbiddenOperationError(`Message ${messageId} was sent from here and cannot be marked read`);
    }
    if (message.readAt !== null) {
      return message;
    }
    const updated: MeshMessage = { ...message, readAt: at };
    this.replace(updated);
    return updated;
  }

  forget(nodeId: string): void {
    const kept = this.messages.filter((message) => conversationKey(message) !== nodeId);
    if (kept.length === this.messages.length) {
      return;
    }
    this.replaceAll(kept);
    this.scheduleSave();
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

  /** Writes the list immediately; rejects with `PersistenceError`. */
  saveNow(): Promise<void> {
    return this.writeQueue.add(async () => {
      const document: MessagesDocument = {
        schemaVersion: MESSAGES_SCHEMA_VERSION,
        savedAt: new Date().toISOString(),
        messages: this.messages,
      };
      const tempPath = `${this.messagesPath}.tmp`;
      try {
        await mkdir(dirname(this.messagesPath), { recursive: true });
        await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
        await rename(tempPath, this.messagesPath);
      } catch (error) {
        throw new PersistenceError('messages-save', this.messagesPath, error);
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

  private store(message: MeshMessage): void {
    this.messages = [...this.messages, message];
    this.byId.set(message.id, message);
    this.applyRetention(Date.now());
    this.scheduleSave();
    this.updates$.next(message);
  }

  private replace(updated: MeshMessage): void {
    this.messages = this.messages.map((message) => (message.id === updated.id ? updated : message));
    this.byId.set(updated.id, updated);
    this.scheduleSave();
    this.updates$.next(updated);
  }

  /** Drops messages past the age limit, then the oldest beyond the count limit. */
  private applyRetention(now: number): number {
    const cutoff = now - MESSAGE_RETENTION_DAYS * DAY_MS;
    let kept = this.messages.filter((message) => message.timestamp > cutoff);
    if (kept.length > MAX_STORED_MESSAGES) {
      kept = [...kept].sort((a, b) => a.timestamp - b.timestamp).slice(-MAX_STORED_MESSAGES);
    }
    const removed = this.messages.length - kept.length;
    if (removed > 0) {
      this.replaceAll(kept);
      this.logger.log(
        `Removed ${removed} messages (keeping ${MAX_STORED_MESSAGES} within ${MESSAGE_RETENTION_DAYS} days)`,
      );
    }
    return removed;
  }

  private replaceAll(messages: MeshMessage[]): void {
    this.messages = messages;
    this.byId.clear();
    messages.forEach((message) => this.byId.set(message.id, message));
  }
}
