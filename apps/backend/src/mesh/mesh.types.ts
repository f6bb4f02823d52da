export type MeshConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/** Broadcast destination on the mesh. */
export const BROADCAST_DESTINATION = '^all';

export const BROADCAST_NODE_NUMBER = 0xffffffff;

/**
 * One packet as delivered by the transport, before any validation. `envelope` is the decoded
 * JSON uplink document; everything inside it is untrusted.
 */
export interface RawMeshEvent {
  envelope: unknown;
  /** Re-announcement of an already-known node rather than a live radio reception. */
  reconciliation: boolean;
  /** Local arrival time, epoch milliseconds. */
  arrivedAt: number;
  topic?: string;
}

export type MeshPacketListener = (event: RawMeshEvent) => void;

export interface MeshSendResult {
  destination: string;
  sentAt: number;
}
