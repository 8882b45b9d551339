import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
    nodeTokenExpiresInSeconds: number;
  };
  logging: {
    level: string;
  };
  cors: {
    origin: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  broker: {
    livenessWindowSec: number;
    heartbeatPeriodSec: number;
    reconcileIntervalMs: number;
    sweepIntervalMs: number;
    firstReportGraceSec: number;
    idleTimeoutSec: number;
    closingRetrySec: number;
    matchRetryLimit: number;
    maxSessionsPerUser: number;
    virtualIpCidr: string;
    relayHost: string;
    identitySalt: string;
    ratePolicyPath?: string;
    extraProtocols: string[];
  };
  credits: {
    signupBonus: number;
    minimumToConnect: number;
  };
  publicGateways: {
    feedUrl?: string;
    syncIntervalMs: number;
    maxNodes: number;
    defaultMaxConnections: number;
  };
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getConfig(): Config {
  return {
    server: {
      port: intFromEnv('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',
      nodeEnv: process.env.NODE_ENV || 'production',
    },
    database: {
      host: process.env.POSTGRES_HOST || 'localhost',
      port: intFromEnv('POSTGRES_PORT', 5432),
      database: process.env.POSTGRES_DB || 'relay_broker',
      user: process.env.POSTGRES_USER || 'postgres',
      password: process.env.POSTGRES_PASSWORD || '',
    },
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: intFromEnv('REDIS_PORT', 6379),
      password: process.env.REDIS_PASSWORD || undefined,
    },
    jwt: {
      secret: process.env.JWT_SECRET || 'change-this-secret',
      expiresInSeconds: intFromEnv('JWT_EXPIRES_IN_SECONDS', 24 * 60 * 60),
      nodeTokenExpiresInSeconds: intFromEnv('NODE_TOKEN_EXPIRES_IN_SECONDS', 30 * 24 * 60 * 60),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
    },
    cors: {
      origin: process.env.CORS_ORIGIN || '*',
    },
    rateLimit: {
      windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 900000),
      maxRequests: intFromEnv('RATE_LIMIT_MAX_REQUESTS', 100),
    },
    broker: {
      livenessWindowSec: intFromEnv('LIVENESS_WINDOW_SEC', 90),
      heartbeatPeriodSec: intFromEnv('HEARTBEAT_PERIOD_SEC', 30),
      reconcileIntervalMs: intFromEnv('RECONCILE_INTERVAL_MS', 15000),
      sweepIntervalMs: intFromEnv('SESSION_SWEEP_INTERVAL_MS', 30000),
      firstReportGraceSec: intFromEnv('FIRST_REPORT_GRACE_SEC', 120),
      idleTimeoutSec: intFromEnv('SESSION_IDLE_TIMEOUT_SEC', 300),
      closingRetrySec: intFromEnv('SESSION_CLOSING_RETRY_SEC', 60),
      matchRetryLimit: intFromEnv('MATCH_RETRY_LIMIT', 3),
      maxSessionsPerUser: intFromEnv('MAX_SESSIONS_PER_USER', 3),
      virtualIpCidr: process.env.VIRTUAL_IP_CIDR || '10.8.0.0/16',
      relayHost: process.env.RELAY_HOST || 'localhost',
      identitySalt: process.env.IDENTITY_HASH_SALT || 'change-this-salt',
      ratePolicyPath: process.env.RATE_POLICY_PATH || undefined,
      extraProtocols: listFromEnv('EXTRA_PROTOCOLS'),
    },
    credits: {
      signupBonus: intFromEnv('SIGNUP_BONUS_CREDITS', 100),
      minimumToConnect: intFromEnv('MINIMUM_CREDITS_TO_CONNECT', 10),
    },
    publicGateways: {
      feedUrl: process.env.PUBLIC_GATEWAY_FEED_URL || undefined,
      syncIntervalMs: intFromEnv('PUBLIC_GATEWAY_SYNC_INTERVAL_MS', 60 * 60 * 1000),
      maxNodes: intFromEnv('PUBLIC_GATEWAY_MAX_NODES', 100),
      defaultMaxConnections: intFromEnv('PUBLIC_GATEWAY_MAX_CONNECTIONS', 50),
    },
  };
}

export const config = getConfig();
