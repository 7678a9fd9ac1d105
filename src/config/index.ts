import dotenv from 'dotenv';

dotenv.config();

const VALID_DURATION = /^(\d+)([smhd])$/;

const DURATION_UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/** Convert a duration such as "7d" or "30m" into milliseconds. */
export function durationToMs(value: string): number {
  const match = VALID_DURATION.exec(value);
  if (!match) {
    throw new Error(
      `Invalid duration "${value}". Expected a value like "7d", "24h", "3600s", or "30m".`
    );
  }
  return parseInt(match[1], 10) * DURATION_UNIT_MS[match[2]];
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name} value "${raw}": expected a non-negative integer`);
  }
  return parsed;
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  server: {
    port: intFromEnv('PORT', 3000),
    nodeEnv,
    corsOrigin: process.env.CORS_ORIGIN || '*',
  },
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: intFromEnv('DB_PORT', 5432),
    database: process.env.DB_NAME || 'relay',
    user: process.env.DB_USER || 'relay_user',
    password: process.env.DB_PASSWORD || 'your_secure_password_here',
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'change-this-to-a-secure-random-string',
    expiresIn: process.env.JWT_EXPIRES_IN || '7d',
  },
  auth: {
    challengeTtlMs: intFromEnv('AUTH_CHALLENGE_TTL_MS', 2 * 60 * 1000),
  },
  preKeys: {
    /** Clients are told to replenish below this pool size. */
    lowWaterMark: intFromEnv('PREKEY_LOW_WATER_MARK', 10),
    targetSize: intFromEnv('PREKEY_TARGET_SIZE', 50),
    maxBatch: intFromEnv('PREKEY_MAX_BATCH', 100),
  },
  messages: {
    /** Per-payload ciphertext limit, in base64 characters. */
    maxCiphertextLength: intFromEnv('MAX_CIPHERTEXT_LENGTH', 65_536),
    historyDefaultLimit: 100,
    historyMaxLimit: 500,
  },
  realtime: {
    retention: intFromEnv('REALTIME_RETENTION', 256),
    maxQueue: intFromEnv('REALTIME_MAX_QUEUE', 128),
    ackTimeoutMs: intFromEnv('REALTIME_ACK_TIMEOUT_MS', 5000),
    pingIntervalMs: intFromEnv('REALTIME_PING_INTERVAL_MS', 30_000),
    /** How long a dropped stream's retained frames wait for the device to reconnect. */
    resumeGraceMs: intFromEnv('REALTIME_RESUME_GRACE_MS', 30_000),
  },
  rateLimit: {
    enabled: nodeEnv !== 'test',
  },
};

export type RealtimeConfig = typeof config.realtime;

// --- Startup validations ---

if (config.jwt.secret === 'change-this-to-a-secure-random-string') {
  if (config.server.nodeEnv === 'production') {
    throw new Error('JWT_SECRET must be set in production; refusing to start with default value.');
  }
  if (config.server.nodeEnv !== 'test') {
    console.warn('⚠️  WARNING: Using default JWT_SECRET. Set JWT_SECRET env var before deploying.');
  }
}

if (!VALID_DURATION.test(config.jwt.expiresIn)) {
  throw new Error(
    `Invalid JWT_EXPIRES_IN value "${config.jwt.expiresIn}". ` +
      'Expected a value like "7d", "24h", "3600s", or "30m".'
  );
}

if (config.preKeys.lowWaterMark > config.preKeys.targetSize) {
  throw new Error('PREKEY_LOW_WATER_MARK must not exceed PREKEY_TARGET_SIZE');
}

if (config.realtime.retention === 0) {
  throw new Error('REALTIME_RETENTION must be at least 1');
}
