import type { TelemetryField } from '../packets/packet.types';

export const HEALTH_COLORS = ['GREEN', 'YELLOW', 'RED'] as const;

export type HealthColor = (typeof HEALTH_COLORS)[number];

export type HealthParameter = 'Battery' | 'Voltage' | 'Temperature';

export interface DerivedStatus {
  isOnline: boolean;
  staleFields: TelemetryField[];
  motionRecent: boolean;
  /** Null when the node was never heard or reports none of the health parameters. */
  healthColor: HealthColor | null;
  reasons: HealthParameter[];
}
