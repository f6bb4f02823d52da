import { z } from 'zod';

const optionalNumber = (schema: z.ZodNumber) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : undefined))
    .pipe(schema.optional());

const booleanFlag = z.enum(['true', 'false']).optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z
    .string()
    .default('3000')
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0).max(65535)),
  HTTP_PREFIX: z.string().default('api'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  STRUCTURED_LOGS: z
    .string()
    .optional()
    .transform((val) => (val ? val !== 'false' : true)),
  MESH_MQTT_URL: z
    .string()
    .url('MESH_MQTT_URL must be a broker URL such as mqtt://localhost:1883')
    .optional(),
  MESH_MQTT_USERNAME: z.string().optional(),
  MESH_MQTT_PASSWORD: z.string().optional(),
  MESH_MQTT_CLIENT_ID: z.string().optional(),
  MESH_ROOT_TOPIC: z.string().min(1).optional(),
  MESH_DOWNLINK_TOPIC: z.string().min(1).optional(),
  MESH_LOCAL_NODE_ID: z
    .string()
    .regex(/^![0-9a-fA-F]{8}$/, 'MESH_LOCAL_NODE_ID must look like !a20a0de0')
    .optional(),
  MESH_CHANNEL_INDEX: optionalNumber(z.number().int().min(0).max(7)),
  MESH_CONNECT_TIMEOUT_MS: optionalNumber(z.number().int().min(1000)),
  STATUS_OFFLINE_THRESHOLD_SECONDS: optionalNumber(z.number().int().positive()),
  TELEMETRY_SEND_INTERVAL_SECONDS: optionalNumber(z.number().int().positive()),
  STATUS_STALE_THRESHOLD_SECONDS: optionalNumber(z.number().int().positive()),
  STATUS_MOTION_WINDOW_SECONDS: optionalNumber(z.number().int().positive()),
  REFRESH_INTERVAL_SECONDS: optionalNumber(z.number().positive()),
  BROADCAST_ENABLED: booleanFlag,
  BROADCAST_HEARTBEAT_SECONDS: optionalNumber(z.number().int().min(60)),
  BROADCAST_INITIAL_DELAY_SECONDS: optionalNumber(z.number().int().min(0)),
  HELP_AUTO_CLEAR_SECONDS: optionalNumber(z.number().int().positive()),
  STATUS_VERSION: z
    .string()
    .regex(/^[^|]+$/, 'STATUS_VERSION must not contain "|"')
    .optional(),
  ALERTS_ENABLED: booleanFlag,
  ALERT_OFFLINE_THRESHOLD_SECONDS: optionalNumber(z.number().int().positive()),
  ALERT_STARTUP_GRACE_SECONDS: optionalNumber(z.number().int().min(0)),
  ALERT_RULES_FILE: z.string().optional(),
  DATA_DIR: z.string().optional(),
  SNAPSHOT_FILE: z.string().optional(),
  SNAPSHOT_DEBOUNCE_MS: optionalNumber(z.number().int().min(0)),
  MESSAGES_FILE: z.string().optional(),
  TELEMETRY_LOG_DIR: z.string().optional(),
  TELEMETRY_LOG_RETAIN_DAYS: optionalNumber(z.number().int().positive()),
  CURRENT_SENSOR_ENABLED: booleanFlag,
  CURRENT_SENSOR_FULL_SCALE_MV: optionalNumber(z.number().positive()),
  CURRENT_SENSOR_FULL_SCALE_A: optionalNumber(z.number().positive()),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.flatten();
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(formatted.fieldErrors, null, 2)}`,
    );
  }

  return parsed.data;
}
