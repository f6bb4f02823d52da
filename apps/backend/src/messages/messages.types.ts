export type MessageDirection = 'received' | 'sent';

export interface MeshMessage {
  id: string;
  direction: MessageDirection;
  /** Sender node id. */
  from: string;
  /** Destination node id, or null for a bulletin to everyone. */
  to: string | null;
  text: string;
  bulletin: boolean;
  /** Carried a `[MSG:<id>]` tag, so the sender can match a receipt to it. */
  structured: boolean;
  /** Epoch milliseconds. */
  timestamp: number;
  /** Sent messages: first receipt from any reader. */
  deliveredAt: number | null;
  /** Sent messages: read time per reader node id. A bulletin collects one entry per reader. */
  readReceipts: Record<string, number>;
  /** Received messages: when the operator here marked it read. */
  readAt: number | null;
}

export interface OutgoingMessage {
  message: MeshMessage;
  /** Wire text including the protocol prefix. */
  payload: string;
}

export interface MarkReadResult {
  message: MeshMessage;
  /** False when the message carried no tag or the receipt could not be sent. */
  receiptSent: boolean;
}
