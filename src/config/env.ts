import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Persistence ─────
  store: {
    dataFile: path.resolve(projectRoot, optional('DATA_FILE', 'data/store.json')),
    seedFile: path.resolve(projectRoot, optional('SEED_FILE', 'data/seed.json')),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'shop:'),
  },

  // ───── Address encryption ─────
  encryption: {
    key: optional('ADDRESS_ENCRYPTION_KEY', 'dev-address-key-change-in-prod'),
  },

  // ───── Coupon slot ─────
  coupon: {
    code: optional('COUPON_CODE', 'SAVE10'),
    percent: optionalInt('COUPON_PERCENT', 10),
  },

  // ───── Conversation drafts ─────
  drafts: {
    idleTimeoutMinutes: optionalInt('DRAFT_IDLE_TIMEOUT_MINUTES', 30),
    sweepIntervalSeconds: optionalInt('DRAFT_SWEEP_INTERVAL_SECONDS', 60),
  },

  shop: {
    supportContact: optional('SUPPORT_CONTACT', 'support@example.com'),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
