/**
 * Digest Module
 */

export {
  sortByDateDescending,
  summarizeListings,
  formatSummary,
  UNKNOWN_DATE,
  type ListingSummary,
  type SummaryBucket,
} from './summary.js';

export {
  formatNotification,
  formatSubject,
  formatTimestamp,
  type NotificationContext,
} from './notification.js';
