import type { HealthColor } from '../status/status.types';

export const STATUS_BROADCAST_PREFIX = '[ICP-STATUS]';

export interface StatusBroadcastMessage {
  /** Sender; implicit on the wire, taken from the transport envelope. */
  nodeId: string;
  color: HealthColor;
  reasons: string[];
  helpRequested: boolean;
  version: string;
  /** Unix seconds. */
  timestamp: number;
}
