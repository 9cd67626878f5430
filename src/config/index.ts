/**
 * Application configuration
 */

import { env } from './env.js';
import { DOMAIN_KEYWORDS, DOMAIN_NAMES, isDomainName, type DomainName } from './keywords.js';

function resolveEnabledDomains(requested: string[] | undefined): DomainName[] {
  if (!requested) {
    return [...DOMAIN_NAMES];
  }
  return requested.filter(isDomainName);
}

export const config = {
  app: {
    name: 'forum-listing-watch',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  smtp: {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    sender: env.SENDER_EMAIL,
    password: env.SENDER_PASSWORD,
    receiver: env.RECEIVER_EMAIL,
  },

  scraper: {
    siteOrigin: 'https://c.dadi360.com',
    pagesToScrape: env.PAGES_TO_SCRAPE,
    topicsPerPage: 90,
    timeout: env.REQUEST_TIMEOUT_MS,
    politenessDelayMs: env.POLITENESS_DELAY_MS,
    userAgent: env.USER_AGENT,
    acceptLanguage: env.ACCEPT_LANGUAGE,
  },

  domains: {
    enabled: resolveEnabledDomains(env.ENABLED_DOMAINS),
    keywords: {
      nail: env.NAIL_KEYWORDS ?? [...DOMAIN_KEYWORDS.nail],
      rental: env.RENTAL_KEYWORDS ?? [...DOMAIN_KEYWORDS.rental],
      restaurant: env.RESTAURANT_KEYWORDS ?? [...DOMAIN_KEYWORDS.restaurant],
    },
  },

  storage: {
    dataDir: env.DATA_DIR,
  },

  scheduler: {
    intervalMs: env.POLL_INTERVAL_SECONDS * 1000,
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export { env } from './env.js';
export { DOMAIN_KEYWORDS, DOMAIN_NAMES, isDomainName, type DomainName } from './keywords.js';
