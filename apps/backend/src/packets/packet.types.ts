import type { StatusBroadcastMessage } from '../broadcast/broadcast.types';

export const TELEMETRY_FIELDS = [
  'battery_level',
  'voltage_internal',
  'voltage_external',
  'temperature',
  'humidity',
  'pressure',
  'snr',
  'channel_utilization',
  'air_util_tx',
  'uptime',
  'current_raw',
] as const;

export type TelemetryField = (typeof TELEMETRY_FIELDS)[number];

export type TelemetryValues = Partial<Record<TelemetryField, number>>;

/** Which Meshtastic metrics group a telemetry packet carried. */
export type TelemetryGroup = 'device' | 'environment' | 'power' | 'mixed';

export type RecordOrigin = 'live' | 'reconciliation';

interface RecordBase {
  nodeId: string;
  /** Epoch milliseconds. */
  receivedAt: number;
  origin: RecordOrigin;
}

export interface TelemetryRecord extends RecordBase {
  kind: 'telemetry';
  group: TelemetryGroup;
  values: TelemetryValues;
  hopsAway: number | null;
}

export interface NodeInfoRecord extends RecordBase {
  kind: 'node-info';
  longName: string | null;
  shortName: string | null;
}

export interface MotionRecord extends RecordBase {
  kind: 'motion';
}

export interface TextRecord extends RecordBase {
  kind: 'text';
  destination: string | null;
  text: string;
}

export interface StatusBroadcastRecord extends RecordBase {
  kind: 'status-broadcast';
  message: StatusBroadcastMessage;
}

/** Any other packet type the node sent: proves the node is alive and nothing more. */
export interface PresenceRecord extends RecordBase {
  kind: 'presence';
  packetType: string;
}

export type NormalizedRecord =
  | TelemetryRecord
  | NodeInfoRecord
  | MotionRecord
  | TextRecord
  | StatusBroadcastRecord
  | PresenceRecord;

export type NormalizedRecordKind = NormalizedRecord['kind'];
