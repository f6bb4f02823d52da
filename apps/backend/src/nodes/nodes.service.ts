import { Injectable, Logger } from '@nestjs/common';

import {
  ChangeSet,
  DependentCache,
  emptyChangeSet,
  ForgetResult,
  HelpFlagUpdate,
  NodeState,
  TelemetryReading,
} from './nodes.types';
import {
  NormalizedRecord,
  TELEMETRY_FIELDS,
  TelemetryField,
  TelemetryRecord,
} from '../packets/packet.types';

type NodeDraft = { -readonly [K in keyof NodeState]: NodeState[K] };

const FORGET_DEPENDENT_CACHES: DependentCache[] = [
  'alerts',
  'remote-status',
  'published-status',
  'messages',
];

export function createNodeState(id: string): NodeState {
  return {
    id,
    shortName: null,
    longName: null,
    lastHeard: null,
    telemetry: {},
    lastMotionAt: null,
    remoteStatus: null,
    helpRequestedAt: null,
    helpCleared: false,
    lastPacketKind: null,
    hopLimit: null,
    lastMessageAt: null,
  };
}

export function isHelpActive(node: NodeState): boolean {
  return node.helpRequestedAt !== null && !node.helpCleared;
}

const maxTime = (current: number | null, candidate: number): number =>
  current === null ? candidate : Math.max(current, candidate);

/**
 * Single owner of all node state. Every mutation swaps in a new map holding new `NodeState`
 * objects, so a snapshot taken by a reader stays consistent while later packets are applied.
 */
@Injectable()
export class NodesService {
  private readonly logger = new Logger(NodesService.name);
  private nodes: ReadonlyMap<string, NodeState> = new Map();
  private motion: ReadonlyMap<string, number> = new Map();

  apply(record: NormalizedRecord): ChangeSet {
    const previous = this.nodes.get(record.nodeId);
    const draft: NodeDraft = { ...(previous ?? createNodeState(record.nodeId)) };
    let dirty = previous === undefined;
    const live = record.origin === 'live';

    // Reconciliation traffic re-announces known nodes and must never make them look heard.
    if (live && record.kind !== 'node-info') {
      const lastHeard = maxTime(draft.lastHeard, record.receivedAt);
      if (lastHeard !== draft.lastHeard) {
        draft.lastHeard = lastHeard;
        dirty = true;
      }
      const packetKind = record.kind === 'presence' ? record.packetType : record.kind;
      if (draft.lastPacketKind !== packetKind) {
        draft.lastPacketKind = packetKind;
        dirty = true;
      }
    }

    switch (record.kind) {
      case 'telemetry':
        dirty = this.applyTelemetry(draft, record) || dirty;
        break;
      case 'node-info':
        if (record.longName !== null && record.longName !== draft.longName) {
          draft.longName = record.longName;
          dirty = true;
        }
        if (record.shortName !== null && record.shortName !== draft.shortName) {
          draft.shortName = record.shortName;
          dirty = true;
        }
        break;
      case 'motion': {
        const lastMotionAt = maxTime(draft.lastMotionAt, record.receivedAt);
        if (lastMotionAt !== draft.lastMotionAt) {
          draft.lastMotionAt = lastMotionAt;
          dirty = true;
        }
        break;
      }
      case 'text': {
        const lastMessageAt = maxTime(draft.lastMessageAt, record.receivedAt);
        if (lastMessageAt !== draft.lastMessageAt) {
          draft.lastMessageAt = lastMessageAt;
          dirty = true;
        }
        break;
      }
      case 'status-broadcast': {
        const { message } = record;
        if (!draft.remoteStatus || draft.remoteStatus.reportedAt <= message.timestamp) {
          draft.remoteStatus = {
            color: message.color,
            reasons: [...message.reasons],
            helpRequested: message.helpRequested,
            version: message.version,
            reportedAt: message.timestamp,
            receivedAt: record.receivedAt,
          };
          dirty = true;
        }
        break;
      }
      case 'presence':
        break;
    }

    if (!dirty) {
      return emptyChangeSet('packet');
    }
    this.commit(draft);
    return {
      nodeIds: [record.nodeId],
      removed: [],
      reason: record.kind === 'status-broadcast' ? 'remote-status' : 'packet',
    };
  }

  /** Local help flag; the only path that touches `helpRequestedAt` and `helpCleared`. */
  applyHelpFlag(update: HelpFlagUpdate): ChangeSet {
    const previous = this.nodes.get(update.nodeId);
    if (!update.requested && (!previous || !isHelpActive(previous))) {
      return emptyChangeSet('help');
    }
    const draft: NodeDraft = { ...(previous ?? createNodeState(update.nodeId)) };

    if (update.requested) {
      draft.helpRequestedAt = update.at;
      draft.helpCleared = false;
    } else {
      draft.helpCleared = true;
    }

    this.commit(draft);
    return { nodeIds: [update.nodeId], removed: [], reason: 'help' };
  }

  snapshot(): ReadonlyMap<string, NodeState> {
    return this.nodes;
  }

  list(): NodeState[] {
    return Array.from(this.nodes.values());
  }

  get(nodeId: string): NodeState | undefined {
    return this.nodes.get(nodeId);
  }

  getLastMotion(nodeId: string): number | undefined {
    return this.motion.get(nodeId);
  }

  /**
   * Removes the node and its motion entry. The caller clears the returned caches before it
   * publishes anything, so observers never see a half-deleted node.
   */
  forget(nodeId: string): ForgetResult {
    const removed = this.nodes.get(nodeId);
    if (!removed) {
      return { removed: null, dependentCaches: [] };
    }
    const nodes = new Map(this.nodes);
    nodes.delete(nodeId);
    const motion = new Map(this.motion);
    motion.delete(nodeId);
    this.nodes = nodes;
    this.motion = motion;
    this.logger.log(`Forgot node ${nodeId}`);
    return { removed, dependentCaches: [...FORGET_DEPENDENT_CACHES] };
  }

  /** Seeds the store from a snapshot. Nodes already present are kept as they are. */
  restore(states: NodeState[]): ChangeSet {
    const nodes = new Map(this.nodes);
    const motion = new Map(this.motion);
    const restored: string[] = [];

    states.forEach((state) => {
      if (nodes.has(state.id)) {
        return;
      }
      nodes.set(state.id, state);
      if (state.lastMotionAt !== null) {
        motion.set(state.id, state.lastMotionAt);
      }
      restored.push(state.id);
    });

    this.nodes = nodes;
    this.motion = motion;
    if (restored.length > 0) {
      this.logger.log(`Restored ${restored.length} nodes from snapshot`);
    }
    return { nodeIds: restored, removed: [], reason: 'restore' };
  }

  private applyTelemetry(draft: NodeDraft, record: TelemetryRecord): boolean {
    const telemetry: Partial<Record<TelemetryField, TelemetryReading>> = {
      ...draft.telemetry,
    };
    let changed = false;

    TELEMETRY_FIELDS.forEach((field) => {
      const value = record.values[field];
      if (value === undefined) {
        return;
      }
      const current = telemetry[field];
      // Per-field monotonic: an older sample never overwrites a newer reading.
      if (current && record.receivedAt < current.updatedAt) {
        return;
      }
      if (current && current.value === value && current.updatedAt === record.receivedAt) {
        return;
      }
      telemetry[field] = { value, updatedAt: record.receivedAt };
      changed = true;
    });

    if (changed) {
      draft.telemetry = telemetry;
    }
    if (record.origin === 'live' && record.hopsAway !== null && draft.hopLimit !== record.hopsAway) {
      draft.hopLimit = record.hopsAway;
      changed = true;
    }
    return changed;
  }

  private commit(state: NodeState): void {
    const nodes = new Map(this.nodes);
    nodes.set(state.id, state);
    this.nodes = nodes;

    const previousMotion = this.motion.get(state.id);
    if (state.lastMotionAt !== null && previousMotion !== state.lastMotionAt) {
      const motion = new Map(this.motion);
      motion.set(state.id, state.lastMotionAt);
      this.motion = motion;
    }
  }
}
