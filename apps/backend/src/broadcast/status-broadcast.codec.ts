import { STATUS_BROADCAST_PREFIX, StatusBroadcastMessage } from './broadcast.types';
import { DecodeError, EncodeError } from '../errors/engine-errors';
import { HEALTH_COLORS, HealthColor } from '../status/status.types';

const SEGMENT_SEPARATOR = '|';
const REASON_SEPARATOR = ',';
const SEGMENT_COUNT = 5;
const TIMESTAMP_PATTERN = /^\d+$/;

export function isStatusBroadcast(text: string): boolean {
  return text.startsWith(STATUS_BROADCAST_PREFIX);
}

function isHealthColor(value: string): value is HealthColor {
  return HEALTH_COLORS.some((color) => color === value);
}

/**
 * `[ICP-STATUS]<color>|<reasons,csv>|<YES|NO>|<version>|<unix_timestamp>`. The reasons segment
 * is always present, empty when there are none, so the segment count never varies.
 */
export function encodeStatusMessage(message: Omit<StatusBroadcastMessage, 'nodeId'>): string {
  if (!isHealthColor(message.color)) {
    throw new EncodeError(`Unknown health color ${String(message.color)}`);
  }
  message.reasons.forEach((reason) => {
    if (reason.trim().length === 0 || reason.includes(REASON_SEPARATOR) || reason.includes(SEGMENT_SEPARATOR)) {
      throw new EncodeError(`Reason "${reason}" cannot be encoded`);
    }
  });
  if (message.version.trim().length === 0 || message.version.includes(SEGMENT_SEPARATOR)) {
    throw new EncodeError(`Version "${message.version}" cannot be encoded`);
  }
  if (!Number.isSafeInteger(message.timestamp) || message.timestamp < 0) {
    throw new EncodeError(`Timestamp ${message.timestamp} is not a unix time in seconds`);
  }

  return (
    STATUS_BROADCAST_PREFIX +
    [
      message.color,
      message.reasons.join(REASON_SEPARATOR),
      message.helpRequested ? 'YES' : 'NO',
      message.version,
      String(message.timestamp),
    ].join(SEGMENT_SEPARATOR)
  );
}

/** Fails closed: anything that is not exactly the wire format raises `DecodeError`. */
export function decodeStatusMessage(nodeId: string, text: string): StatusBroadcastMessage {
  if (!isStatusBroadcast(text)) {
    throw new DecodeError('missing status prefix', text);
  }
  const segments = text.slice(STATUS_BROADCAST_PREFIX.length).trim().split(SEGMENT_SEPARATOR);
  if (segments.length !== SEGMENT_COUNT) {
    throw new DecodeError(`expected ${SEGMENT_COUNT} segments, got ${segments.length}`, text);
  }
  const [color, reasonsSegment, help, version, timestampSegment] = segments;

  if (!isHealthColor(color)) {
    throw new DecodeError(`unknown color "${color}"`, text);
  }

  const reasons = reasonsSegment.length === 0 ? [] : reasonsSegment.split(REASON_SEPARATOR);
  if (reasons.some((reason) => reason.trim().length === 0)) {
    throw new DecodeError('empty reason entry', text);
  }

  if (help !== 'YES' && help !== 'NO') {
    throw new DecodeError(`help flag must be YES or NO, got "${help}"`, text);
  }

  if (version.trim().length === 0) {
    throw new DecodeError('missing version', text);
  }

  if (!TIMESTAMP_PATTERN.test(timestampSegment)) {
    throw new DecodeError(`invalid timestamp "${timestampSegment}"`, text);
  }
  const timestamp = Number(timestampSegment);
  if (!Number.isSafeInteger(timestamp)) {
    throw new DecodeError(`timestamp out of range "${timestampSegment}"`, text);
  }

  return {
    nodeId,
    color,
    reasons,
    helpRequested: help === 'YES',
    version,
    timestamp,
  };
}
