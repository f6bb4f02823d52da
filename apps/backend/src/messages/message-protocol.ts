import { BROADCAST_DESTINATION } from '../mesh/mesh.types';

const MESSAGE_PREFIX = '[MSG:';
const RECEIPT_PREFIX = '[RECEIPT:';
/** Asks the receiving station to send its telemetry now. */
export const TELEMETRY_REQUEST_TEXT = '[REQ:TELEMETRY]';
const MESSAGE_PATTERN = /^\[MSG:([^\]]+)\]([\s\S]*)$/;
const RECEIPT_PATTERN = /^\[RECEIPT:([^\]]+)\]/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

/** `<sender hex>_<epoch ms>`, unique per sender. */
export function generateMessageId(localNodeId: string | null, now = Date.now()): string {
  const sender = localNodeId?.startsWith('!') ? localNodeId.slice(1) : 'unknown';
  return `${sender}_${now}`;
}

export function formatOutgoingMessage(text: string, messageId: string): string {
  return `${MESSAGE_PREFIX}${messageId}]${text}`;
}

export function formatReadReceipt(messageId: string): string {
  return `${RECEIPT_PREFIX}${messageId}]`;
}

export function parseProtocolMessage(text: string): { id: string; text: string } | null {
  const match = MESSAGE_PATTERN.exec(text);
  return match ? { id: match[1], text: match[2] } : null;
}

export function parseReceipt(text: string): string | null {
  const match = RECEIPT_PATTERN.exec(text);
  return match ? match[1] : null;
}

export function isTelemetryRequest(text: string): boolean {
  return text.trim() === TELEMETRY_REQUEST_TEXT;
}

export function isBulletin(destination: string | null): boolean {
  return !destination || destination === BROADCAST_DESTINATION;
}

/** Drops control characters such as bell and tab; ordinary spaces are kept. */
export function cleanDisplayText(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '');
}
