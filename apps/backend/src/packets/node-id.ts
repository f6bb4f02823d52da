const NODE_ID_PATTERN = /^![0-9a-f]{8}$/;
const BARE_HEX_PATTERN = /^[0-9a-f]{1,8}$/;

/**
 * Canonical node id: `!` followed by eight lowercase hex digits. Accepts the numeric node
 * number, `!`-prefixed ids and bare hex. Returns null for anything else.
 */
export function normalizeNodeId(value: unknown): string | null {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      return null;
    }
    return `!${value.toString(16).padStart(8, '0')}`;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim().toLowerCase();
  const hex = trimmed.startsWith('!') ? trimmed.slice(1) : trimmed;
  if (!BARE_HEX_PATTERN.test(hex)) {
    return null;
  }
  return `!${hex.padStart(8, '0')}`;
}

export function isCanonicalNodeId(value: string): boolean {
  return NODE_ID_PATTERN.test(value);
}

export function nodeNumberFromId(nodeId: string): number {
  return Number.parseInt(nodeId.slice(1), 16);
}

/** Directory-safe form used for per-node log folders. */
export function nodeIdPathSegment(nodeId: string): string {
  return nodeId.replace(/^!/, '');
}
