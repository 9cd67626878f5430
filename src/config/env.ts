/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const csv = z
  .string()
  .optional()
  .transform((value) =>
    value
      ? value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : undefined
  );

/**
 * Blank assignments in .env (`SENDER_EMAIL=`) count as unset
 */
function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const envSchema = z.object({
  // SMTP delivery
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SENDER_EMAIL: blankAsUndefined(z.string().email()),
  SENDER_PASSWORD: blankAsUndefined(z.string()),
  RECEIVER_EMAIL: blankAsUndefined(z.string().email()),

  // Scheduling
  // Capped so the interval in milliseconds fits a Node.js timer
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().max(2147483).default(172800),
  CRON_SCHEDULE: blankAsUndefined(z.string()),
  TZ: z.string().default('America/New_York'),

  // Listing domains
  ENABLED_DOMAINS: csv,
  NAIL_KEYWORDS: csv,
  RENTAL_KEYWORDS: csv,
  RESTAURANT_KEYWORDS: csv,
  PAGES_TO_SCRAPE: z.coerce.number().int().min(1).default(5),

  // Scraping
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  POLITENESS_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),
  ACCEPT_LANGUAGE: z.string().default('zh-CN,zh;q=0.9,en;q=0.8'),

  // Storage
  DATA_DIR: z.string().default('./data'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: blankAsUndefined(z.string()),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
