import { z } from 'zod';
import { DEFAULT_TOPICS, type Topics } from '../../types';

export type { Topics };

const ShelfDefaultsSchema = z.record(z.string().min(1), z.number().positive());

export type ShelfDefaults = z.infer<typeof ShelfDefaultsSchema>;

export const DEFAULT_SHELVES: ShelfDefaults = { A1: 30.0, A2: 30.0, B1: 20.0 };

export interface AppConfig {
  port: number;
  corsOrigin: string[] | string;
  mqtt: {
    host: string;
    port: number;
    username?: string;
    password?: string;
    clientId: string;
    topics: Topics;
  };
  timeouts: {
    discoveryMs: number;
    heartbeatMs: number;
    shelfConfigMs: number;
  };
  database: {
    file: string;
    seedDefaults: boolean;
  };
  analysis: {
    occupiedThresholdCm: number;
    shelfDefaults: ShelfDefaults;
  };
  firebase: {
    serviceAccountPath: string | null;
    databaseURL: string | null;
  };
  schedule: {
    heartbeatCron: string;
    retentionCron: string;
    keepDays: number;
    keepMinRecords: number;
  };
}

type Env = Record<string, string | undefined>;

const int = (value: string | undefined, fallback: number) => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const float = (value: string | undefined, fallback: number) => {
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
};

export function parseShelfDefaults(raw: string | undefined): ShelfDefaults {
  if (!raw) return { ...DEFAULT_SHELVES };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`SHELF_DEFAULTS is not valid JSON: ${String(error)}`);
  }

  const result = ShelfDefaultsSchema.safeParse(json);
  if (!result.success) {
    throw new Error(`SHELF_DEFAULTS must map shelf ids to positive distances: ${result.error.message}`);
  }
  return result.data;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: int(env.PORT, 5000),
    corsOrigin: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : '*',
    mqtt: {
      host: env.MQTT_HOST ?? 'localhost',
      port: int(env.MQTT_PORT, 1883),
      username: env.MQTT_USER || undefined,
      password: env.MQTT_PASS || undefined,
      clientId: env.MQTT_CLIENT_ID ?? 'shelf-monitor-hub',
      topics: {
        sensor: env.TOPIC_SENSOR ?? DEFAULT_TOPICS.sensor,
        status: env.TOPIC_STATUS ?? DEFAULT_TOPICS.status,
        command: env.TOPIC_COMMAND ?? DEFAULT_TOPICS.command,
        discovery: env.TOPIC_DISCOVERY ?? DEFAULT_TOPICS.discovery,
        discoveryResponse: env.TOPIC_DISCOVERY_RESPONSE ?? DEFAULT_TOPICS.discoveryResponse,
        heartbeat: env.TOPIC_HEARTBEAT ?? DEFAULT_TOPICS.heartbeat,
        heartbeatResponse: env.TOPIC_HEARTBEAT_RESPONSE ?? DEFAULT_TOPICS.heartbeatResponse,
        configRequest: env.TOPIC_SHELF_CONFIG_REQUEST ?? DEFAULT_TOPICS.configRequest,
        configResponse: env.TOPIC_SHELF_CONFIG_RESPONSE ?? DEFAULT_TOPICS.configResponse,
        calibrateResponse: env.TOPIC_CALIBRATE_RESPONSE ?? DEFAULT_TOPICS.calibrateResponse,
      },
    },
    timeouts: {
      discoveryMs: int(env.DISCOVERY_TIMEOUT_MS, 5000),
      heartbeatMs: int(env.HEARTBEAT_TIMEOUT_MS, 5000),
      shelfConfigMs: int(env.SHELF_CONFIG_TIMEOUT_MS, 5000),
    },
    database: {
      file: env.DB_FILE ?? 'data/shelf_data.db',
      seedDefaults: env.SEED_DEFAULTS !== 'false',
    },
    analysis: {
      occupiedThresholdCm: float(env.OCCUPIED_THRESHOLD_CM, 2.0),
      shelfDefaults: parseShelfDefaults(env.SHELF_DEFAULTS),
    },
    firebase: {
      serviceAccountPath: env.FIREBASE_SERVICE_ACCOUNT || null,
      databaseURL: env.FIREBASE_DATABASE_URL || null,
    },
    schedule: {
      heartbeatCron: env.HEARTBEAT_CRON ?? '*/5 * * * *',
      retentionCron: env.RETENTION_CRON ?? '0 3 * * *',
      keepDays: int(env.RETENTION_KEEP_DAYS, 7),
      keepMinRecords: int(env.RETENTION_KEEP_MIN_RECORDS, 1000),
    },
  };
}
