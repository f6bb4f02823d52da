import { assertThresholdRelations, HealthThresholds } from './engine-settings';

const parseNumberEnv = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? Number(value) : fallback;

const parseBooleanEnv = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined || value === '' ? fallback : value === 'true';

const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  battery: { redBelow: 25, yellowAtOrBelow: 50 },
  voltage: { redBelow: 3.5, yellowBelow: 4.0 },
  temperature: { yellowBelow: 0, yellowAbove: 35, redAbove: 45 },
};

export default () => {
  const rootTopic = process.env.MESH_ROOT_TOPIC ?? 'msh/US/2/json';

  const config = {
    env: process.env.NODE_ENV ?? 'development',
    http: {
      port: parseNumberEnv(process.env.PORT, 3000),
      prefix: process.env.HTTP_PREFIX ?? 'api',
    },
    logging: {
      level: process.env.LOG_LEVEL ?? 'info',
      structured: process.env.STRUCTURED_LOGS !== 'false',
    },
    mesh: {
      mqttUrl: process.env.MESH_MQTT_URL ?? 'mqtt://localhost:1883',
      username: process.env.MESH_MQTT_USERNAME,
      password: process.env.MESH_MQTT_PASSWORD,
      clientId: process.env.MESH_MQTT_CLIENT_ID ?? 'mesh-telemetry-engine',
      rootTopic,
      downlinkTopic: process.env.MESH_DOWNLINK_TOPIC ?? `${rootTopic}/mqtt/`,
      localNodeId: process.env.MESH_LOCAL_NODE_ID?.toLowerCase(),
      channelIndex: parseNumberEnv(process.env.MESH_CHANNEL_INDEX, 0),
      connectTimeoutMs: parseNumberEnv(process.env.MESH_CONNECT_TIMEOUT_MS, 10_000),
    },
    status: {
      offlineThresholdSeconds: parseNumberEnv(process.env.STATUS_OFFLINE_THRESHOLD_SECONDS, 960),
      sendIntervalSeconds: parseNumberEnv(process.env.TELEMETRY_SEND_INTERVAL_SECONDS, 300),
      staleThresholdSeconds: parseNumberEnv(process.env.STATUS_STALE_THRESHOLD_SECONDS, 3600),
      motionWindowSeconds: parseNumberEnv(process.env.STATUS_MOTION_WINDOW_SECONDS, 300),
      health: DEFAULT_HEALTH_THRESHOLDS,
    },
    refresh: {
      intervalSeconds: parseNumberEnv(process.env.REFRESH_INTERVAL_SECONDS, 5),
    },
    broadcast: {
      enabled: parseBooleanEnv(process.env.BROADCAST_ENABLED, true),
      heartbeatSeconds: parseNumberEnv(process.env.BROADCAST_HEARTBEAT_SECONDS, 15 * 60),
      initialDelaySeconds: parseNumberEnv(process.env.BROADCAST_INITIAL_DELAY_SECONDS, 30),
      helpAutoClearSeconds: parseNumberEnv(process.env.HELP_AUTO_CLEAR_SECONDS, 60 * 60),
      version: process.env.STATUS_VERSION ?? '1.3.0',
    },
    alerts: {
      enabled: parseBooleanEnv(process.env.ALERTS_ENABLED, true),
      offlineThresholdSeconds: parseNumberEnv(process.env.ALERT_OFFLINE_THRESHOLD_SECONDS, 600),
      startupGraceSeconds: parseNumberEnv(process.env.ALERT_STARTUP_GRACE_SECONDS, 600),
      rulesFile: process.env.ALERT_RULES_FILE ?? 'config/alert-rules.json',
    },
    persistence: {
      dataDir: process.env.DATA_DIR ?? 'data',
      snapshotFile: process.env.SNAPSHOT_FILE ?? 'latest_data.json',
      snapshotDebounceMs: parseNumberEnv(process.env.SNAPSHOT_DEBOUNCE_MS, 2000),
      messagesFile: process.env.MESSAGES_FILE ?? 'messages.json',
      logDir: process.env.TELEMETRY_LOG_DIR ?? 'logs',
      retainDays: parseNumberEnv(process.env.TELEMETRY_LOG_RETAIN_DAYS, 30),
    },
    currentSensor: {
      enabled: parseBooleanEnv(process.env.CURRENT_SENSOR_ENABLED, false),
      fullScaleMv: parseNumberEnv(process.env.CURRENT_SENSOR_FULL_SCALE_MV, 350),
      fullScaleA: parseNumberEnv(process.env.CURRENT_SENSOR_FULL_SCALE_A, 3.5),
    },
  };

  assertThresholdRelations({
    offlineThresholdSeconds: config.status.offlineThresholdSeconds,
    sendIntervalSeconds: config.status.sendIntervalSeconds,
    refreshIntervalSeconds: config.refresh.intervalSeconds,
    health: config.status.health,
  });

  return config;
};
