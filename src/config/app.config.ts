import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Production and tests get their environment injected; only local runs read .env
if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
  loadEnv();
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  FRONTEND_URL: z.string().url().default('http://localhost:3000'),
  TRACKER_DB_PATH: z.string().min(1).default('tracker.db'),
  PRICES_DB_PATH: z.string().min(1).default('prices.db'),
  SCRAPE_ON_START: booleanFlag,
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(2),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  SNAPSHOT_DIR: z.string().min(1).optional(),
  RESEND_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM: z.string().min(1).optional(),
  EMAIL_TO: z.string().min(1).optional(),
});

export interface EmailOptions {
  apiKey?: string;
  from?: string;
  to?: string;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  database: {
    trackerPath: string;
    pricesPath: string;
  };
  scraping: {
    scrapeOnStart: boolean;
    requestTimeout: number;
    retryAttempts: number;
    retryDelay: number;
    userAgent: string;
    snapshotDir?: string;
  };
  email: EmailOptions;
}

/**
 * Validate the process environment and map it onto the typed config shape.
 * Throws with every offending variable listed when validation fails.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    frontendUrl: values.FRONTEND_URL,
    database: {
      trackerPath: values.TRACKER_DB_PATH,
      pricesPath: values.PRICES_DB_PATH,
    },
    scraping: {
      scrapeOnStart: values.SCRAPE_ON_START,
      requestTimeout: values.REQUEST_TIMEOUT_MS,
      retryAttempts: values.RETRY_ATTEMPTS,
      retryDelay: values.RETRY_DELAY_MS,
      userAgent: values.USER_AGENT,
      snapshotDir: values.SNAPSHOT_DIR,
    },
    email: {
      apiKey: values.RESEND_API_KEY,
      from: values.EMAIL_FROM,
      to: values.EMAIL_TO,
    },
  };
}

export const appConfig = loadAppConfig();
