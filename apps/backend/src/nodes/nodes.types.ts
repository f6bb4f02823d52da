import type { HealthColor } from '../status/status.types';
import type { TelemetryField } from '../packets/packet.types';

export interface TelemetryReading {
  value: number;
  /** Epoch milliseconds of the sample that set this value. */
  updatedAt: number;
}

export type TelemetryReadings = Readonly<Partial<Record<TelemetryField, TelemetryReading>>>;

/** Latest status broadcast received from the node itself. Display-only. */
export interface RemoteStatus {
  color: HealthColor;
  reasons: string[];
  helpRequested: boolean;
  version: string;
  /** Sender's clock, unix seconds. */
  reportedAt: number;
  /** Local arrival, epoch milliseconds. */
  receivedAt: number;
}

export interface NodeState {
  readonly id: string;
  readonly shortName: string | null;
  readonly longName: string | null;
  /** Epoch milliseconds of the latest live packet; null when never heard. */
  readonly lastHeard: number | null;
  readonly telemetry: TelemetryReadings;
  readonly lastMotionAt: number | null;
  readonly remoteStatus: RemoteStatus | null;
  readonly helpRequestedAt: number | null;
  readonly helpCleared: boolean;
  readonly lastPacketKind: string | null;
  readonly hopLimit: number | null;
  readonly lastMessageAt: number | null;
}

export type ChangeReason = 'packet' | 'refresh' | 'forget' | 'restore' | 'help' | 'remote-status';

export interface ChangeSet {
  nodeIds: string[];
  removed: string[];
  reason: ChangeReason;
}

/** Caches outside the store that still hold state for a forgotten node. */
export type DependentCache = 'alerts' | 'remote-status' | 'published-status' | 'messages';

export interface ForgetResult {
  removed: NodeState | null;
  dependentCaches: DependentCache[];
}

/** Local help flag change; never produced from a received packet. */
export interface HelpFlagUpdate {
  nodeId: string;
  requested: boolean;
  at: number;
}

export function emptyChangeSet(reason: ChangeReason): ChangeSet {
  return { nodeIds: [], removed: [], reason };
}
