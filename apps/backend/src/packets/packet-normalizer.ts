import { Injectable } from '@nestjs/common';
import { z } from 'zod';

import { normalizeNodeId } from './node-id';
import {
  NormalizedRecord,
  RecordOrigin,
  TelemetryField,
  TelemetryGroup,
  TelemetryRecord,
  TelemetryValues,
} from './packet.types';
import { decodeStatusMessage, isStatusBroadcast } from '../broadcast/status-broadcast.codec';
import { NormalizationError } from '../errors/engine-errors';
import { BROADCAST_DESTINATION, BROADCAST_NODE_NUMBER, RawMeshEvent } from '../mesh/mesh.types';

/** A gateway clock this far ahead of ours is not trusted. */
const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;
const MAX_NAME_LENGTH = 40;

const FIELD_RANGES: Record<TelemetryField, readonly [number, number]> = {
  battery_level: [0, 101],
  voltage_internal: [0, 60],
  voltage_external: [0, 60],
  temperature: [-60, 125],
  humidity: [0, 100],
  pressure: [0, 2000],
  snr: [-50, 50],
  channel_utilization: [0, 100],
  air_util_tx: [0, 100],
  uptime: [0, Number.MAX_SAFE_INTEGER],
  current_raw: [-100_000, 100_000],
};

interface FieldSource {
  group: Exclude<TelemetryGroup, 'mixed'>;
  field: TelemetryField;
  /** Key in the flat uplink JSON. */
  flat: string;
  /** Key inside the nested `<group>Metrics` object. */
  nested: string;
}

// Ch3 carries the external battery; its current wins over the generic current reading.
const FIELD_SOURCES: FieldSource[] = [
  { group: 'device', field: 'battery_level', flat: 'battery_level', nested: 'batteryLevel' },
  { group: 'device', field: 'voltage_internal', flat: 'voltage', nested: 'voltage' },
  { group: 'device', field: 'channel_utilization', flat: 'channel_utilization', nested: 'channelUtilization' },
  { group: 'device', field: 'air_util_tx', flat: 'air_util_tx', nested: 'airUtilTx' },
  { group: 'device', field: 'uptime', flat: 'uptime_seconds', nested: 'uptimeSeconds' },
  { group: 'environment', field: 'temperature', flat: 'temperature', nested: 'temperature' },
  { group: 'environment', field: 'humidity', flat: 'relative_humidity', nested: 'relativeHumidity' },
  { group: 'environment', field: 'pressure', flat: 'barometric_pressure', nested: 'barometricPressure' },
  { group: 'power', field: 'voltage_external', flat: 'ch3_voltage', nested: 'ch3Voltage' },
  { group: 'power', field: 'current_raw', flat: 'current', nested: 'current' },
  { group: 'power', field: 'current_raw', flat: 'ch3_current', nested: 'ch3Current' },
];

const NESTED_GROUP_KEYS: Record<FieldSource['group'], string> = {
  device: 'deviceMetrics',
  environment: 'environmentMetrics',
  power: 'powerMetrics',
};

const PRESENCE_PACKET_TYPES = new Set([
  'position',
  'neighborinfo',
  'traceroute',
  'routing',
  'waypoint',
  'range_test',
  'store_forward',
  'paxcounter',
  'mapreport',
]);

const MOTION_PACKET_TYPES = new Set(['detection', 'detection_sensor']);

const nodeRefSchema = z.union([z.number(), z.string()]);

const envelopeSchema = z.object({
  from: nodeRefSchema,
  to: nodeRefSchema.nullish(),
  type: z.string().trim().min(1),
  payload: z.unknown(),
  timestamp: z.number().finite().nonnegative().nullish(),
  snr: z.number().finite().nullish(),
  hops_away: z.number().int().nonnegative().nullish(),
  hop_start: z.number().int().nonnegative().nullish(),
});

type Envelope = z.infer<typeof envelopeSchema>;

const metricsObjectSchema = z.record(z.unknown());

const nodeInfoSchema = z.object({
  longname: z.string().nullish(),
  shortname: z.string().nullish(),
  longName: z.string().nullish(),
  shortName: z.string().nullish(),
});

const textPayloadSchema = z.union([z.string(), z.object({ text: z.string() })]);

@Injectable()
export class PacketNormalizer {
  /** Converts one transport event into a typed record or throws `NormalizationError`. */
  normalize(event: RawMeshEvent): NormalizedRecord {
    const parsed = envelopeSchema.safeParse(event.envelope);
    if (!parsed.success) {
      throw new NormalizationError(`invalid envelope: ${this.describeIssues(parsed.error)}`);
    }
    const envelope = parsed.data;
    const nodeId = normalizeNodeId(envelope.from);
    if (!nodeId) {
      throw new NormalizationError(`invalid sender ${String(envelope.from)}`);
    }

    const origin: RecordOrigin = event.reconciliation ? 'reconciliation' : 'live';
    const receivedAt = this.resolveReceivedAt(envelope.timestamp, event.arrivedAt);
    const base = { nodeId, receivedAt, origin };
    const type = envelope.type.toLowerCase();

    if (type === 'telemetry') {
      return this.normalizeTelemetry(base, envelope);
    }
    if (type === 'nodeinfo') {
      const info = nodeInfoSchema.safeParse(envelope.payload);
      if (!info.success) {
        throw new NormalizationError(`invalid nodeinfo payload: ${this.describeIssues(info.error)}`, nodeId);
      }
      const longName = this.cleanName(info.data.longname ?? info.data.longName);
      const shortName = this.cleanName(info.data.shortname ?? info.data.shortName);
      if (longName === null && shortName === null) {
        throw new NormalizationError('nodeinfo carries no names', nodeId);
      }
      return { ...base, kind: 'node-info', longName, shortName };
    }
    if (type === 'text') {
      return this.normalizeText(base, envelope);
    }
    if (MOTION_PACKET_TYPES.has(type)) {
      return { ...base, kind: 'motion' };
    }
    if (PRESENCE_PACKET_TYPES.has(type)) {
      return { ...base, kind: 'presence', packetType: type };
    }
    throw new NormalizationError(`unsupported packet type ${envelope.type}`, nodeId);
  }

  private normalizeTelemetry(
    base: Pick<TelemetryRecord, 'nodeId' | 'receivedAt' | 'origin'>,
    envelope: Envelope,
  ): TelemetryRecord {
    const payload = metricsObjectSchema.safeParse(envelope.payload);
    if (!payload.success) {
      throw new NormalizationError('telemetry payload is not an object', base.nodeId);
    }

    const values: TelemetryValues = {};
    const groups = new Set<FieldSource['group']>();
    for (const source of FIELD_SOURCES) {
      const nested = metricsObjectSchema.safeParse(payload.data[NESTED_GROUP_KEYS[source.group]]);
      const raw = payload.data[source.flat] ?? (nested.success ? nested.data[source.nested] : undefined);
      if (raw === undefined || raw === null) {
        continue;
      }
      values[source.field] = this.readField(base.nodeId, source.field, raw);
      groups.add(source.group);
    }

    if (groups.size === 0) {
      throw new NormalizationError('telemetry payload has no recognised fields', base.nodeId);
    }
    if (envelope.snr !== undefined && envelope.snr !== null) {
      values.snr = this.readField(base.nodeId, 'snr', envelope.snr);
    }

    const [onlyGroup] = Array.from(groups);
    return {
      ...base,
      kind: 'telemetry',
      group: groups.size === 1 ? onlyGroup : 'mixed',
      values,
      hopsAway: envelope.hops_away ?? null,
    };
  }

  private normalizeText(
    base: { nodeId: string; receivedAt: number; origin: RecordOrigin },
    envelope: Envelope,
  ): NormalizedRecord {
    const payload = textPayloadSchema.safeParse(envelope.payload);
    if (!payload.success) {
      throw new NormalizationError('text payload is missing', base.nodeId);
    }
    const text = typeof payload.data === 'string' ? payload.data : payload.data.text;

    // Status broadcasts never reach ordinary message handling; a malformed one raises DecodeError.
    if (isStatusBroadcast(text)) {
      return { ...base, kind: 'status-broadcast', message: decodeStatusMessage(base.nodeId, text) };
    }

    return {
      ...base,
      kind: 'text',
      destination: this.resolveDestination(envelope.to),
      text,
    };
  }

  private readField(nodeId: string, field: TelemetryField, raw: unknown): number {
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new NormalizationError(`${field} is not a finite number`, nodeId);
    }
    const [min, max] = FIELD_RANGES[field];
    if (raw < min || raw > max) {
      throw new NormalizationError(`${field}=${raw} outside ${min}..${max}`, nodeId);
    }
    return raw;
  }

  private resolveDestination(to: Envelope['to']): string | null {
    if (to === undefined || to === null) {
      return null;
    }
    if (to === BROADCAST_NODE_NUMBER || to === BROADCAST_DESTINATION) {
      return BROADCAST_DESTINATION;
    }
    return normalizeNodeId(to);
  }

  private resolveReceivedAt(timestampSeconds: number | null | undefined, arrivedAt: number): number {
    if (!timestampSeconds) {
      return arrivedAt;
    }
    const timestampMs = Math.round(timestampSeconds * 1000);
    return timestampMs > arrivedAt + MAX_CLOCK_SKEW_MS ? arrivedAt : timestampMs;
  }

  private cleanName(value: string | null | undefined): string | null {
    // eslint-disable-next-line no-control-regex
    const cleaned = value?.replace(/[\u0000-\u001f\u007f]/g, '').trim();
    return cleaned ? cleaned.slice(0, MAX_NAME_LENGTH) : null;
  }

  private describeIssues(error: z.ZodError): string {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
  }
}
