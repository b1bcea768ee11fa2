// Environment-driven settings. CLI flags override these per run.
import { z } from 'zod';
import { DEFAULT_CSW_URL, DEFAULT_SERVICE_OWNER } from '../constants.js';
import { ConfigError } from '../errors.js';

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const SettingsSchema = z.object({
  CSW_URL: z.string().url().default(DEFAULT_CSW_URL),
  SERVICE_OWNER: z.string().min(1).default(DEFAULT_SERVICE_OWNER),
  HARVEST_CONCURRENCY: intFromEnv(10, 1),
  HARVEST_MAX_ATTEMPTS: intFromEnv(3, 1),
  HARVEST_RETRY_DELAY_MS: intFromEnv(5000, 0),
  HARVEST_REQUEST_TIMEOUT_MS: intFromEnv(30000, 1),
  HARVEST_USER_AGENT: z.string().min(1).default('geoharvest/0.1.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  AWS_REGION: z.string().optional(),
});

export interface Settings {
  cswUrl: string;
  serviceOwner: string;
  concurrency: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  userAgent: string;
  logLevel: string;
  awsRegion?: string;
}

type Env = Record<string, string | undefined>;

export function loadSettings(env: Env = process.env): Settings {
  // Empty strings count as unset, matching `VAR= command` shell usage.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = SettingsSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid environment: ${issues}`);
  }
  const s = parsed.data;
  return {
    cswUrl: s.CSW_URL,
    serviceOwner: s.SERVICE_OWNER,
    concurrency: s.HARVEST_CONCURRENCY,
    maxAttempts: s.HARVEST_MAX_ATTEMPTS,
    retryDelayMs: s.HARVEST_RETRY_DELAY_MS,
    requestTimeoutMs: s.HARVEST_REQUEST_TIMEOUT_MS,
    userAgent: s.HARVEST_USER_AGENT,
    logLevel: s.LOG_LEVEL,
    awsRegion: s.AWS_REGION,
  };
}
