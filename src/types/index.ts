/**
 * Core types for the forum listing monitor
 */

import type { DomainName } from '../config/keywords.js';

export interface ListingRecord {
  title: string;
  /** Always absolute */
  link: string;
  author: string;
  /** Raw date text as scraped; may be empty */
  date: string;
  description?: string;
  domain: DomainName;
}

/**
 * Dedup key: title + link
 */
export type Identity = string;

export type PipelineStage =
  | 'idle'
  | 'fetching'
  | 'extracting'
  | 'deduplicating'
  | 'enriching'
  | 'sorting'
  | 'notifying'
  | 'persisting';

export interface PipelineResult {
  domain: DomainName;
  pagesFetched: number;
  pagesFailed: number;
  candidates: number;
  newListings: ListingRecord[];
  enrichmentFailures: number;
  notified: boolean;
  persisted: boolean;
  /** Set when the run aborted on an unexpected fault */
  failed: boolean;
  /** Identity set to carry into the next run */
  known: Set<Identity>;
  durationMs: number;
}

export interface NotificationMessage {
  subject: string;
  body: string;
}

export interface ScraperConfig {
  timeout: number;
  userAgent: string;
  acceptLanguage: string;
}
