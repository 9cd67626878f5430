/**
 * HTTP page fetcher
 *
 * Plain GET with a browser-like header set. Certificate verification is off:
 * the monitored forum serves a broken chain and the pages are public.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { Agent } from 'https';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { ScraperConfig } from '../types/index.js';
import type { PageFetcher } from './types.js';

const DEFAULT_SCRAPER_CONFIG: ScraperConfig = {
  timeout: config.scraper.timeout,
  userAgent: config.scraper.userAgent,
  acceptLanguage: config.scraper.acceptLanguage,
};

export function buildRequestHeaders(scraper: ScraperConfig): Record<string, string> {
  return {
    'User-Agent': scraper.userAgent,
    'Accept-Language': scraper.acceptLanguage,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  };
}

export class HttpPageFetcher implements PageFetcher {
  readonly http: AxiosInstance;

  constructor(
    scraper: ScraperConfig = DEFAULT_SCRAPER_CONFIG,
    overrides: CreateAxiosDefaults = {}
  ) {
    this.http = axios.create({
      timeout: scraper.timeout,
      headers: buildRequestHeaders(scraper),
      httpsAgent: new Agent({ rejectUnauthorized: false }),
      responseType: 'text',
      maxRedirects: 5,
      ...overrides,
    });
  }

  async fetchHtml(url: string): Promise<string | null> {
    try {
      logger.debug({ url }, 'Requesting page');
      const response = await this.http.get<unknown>(url);

      if (typeof response.data !== 'string') {
        logger.warn({ url, type: typeof response.data }, 'Unexpected non-text response body');
        return null;
      }

      return response.data;
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `${error.code ?? 'HTTP_ERROR'}: ${error.message}`
        : String(error);
      logger.error({ url, error: message }, 'Request failed');
      return null;
    }
  }
}
