/**
 * Forum Listing Watch
 *
 * Polls forum listing boards for topics matching each domain's keywords and
 * e-mails the new ones:
 * 1. Fetches the listing pages of every enabled domain
 * 2. Keeps rows whose title contains a search term
 * 3. Skips rows notified in earlier runs
 * 4. Adds the detail-page text and sends one e-mail per run
 *
 * Usage:
 *   node dist/index.js --service            - Run every enabled domain on its schedule
 *   node dist/index.js --run                - Run every enabled domain once and exit
 *   node dist/index.js --run --domain=nail  - Restrict to the listed domains
 *   node dist/index.js                      - Default: service mode
 */

import { config, isDomainName, type DomainName } from './config/index.js';
import { getListingSource } from './config/domains.js';
import { MonitorLauncher } from './launcher.js';
import { ListingMonitor } from './monitor.js';
import { createSchedule } from './scheduler.js';
import { logger } from './utils/logger.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isRunOnce = args.includes('--run');
const isService = args.includes('--service') || !isRunOnce;

function selectDomains(): DomainName[] {
  const domainArg = args.find((arg) => arg.startsWith('--domain='));
  if (!domainArg) {
    return [...config.domains.enabled];
  }

  const requested = domainArg
    .slice('--domain='.length)
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  const unknown = requested.filter((name) => !isDomainName(name));
  if (unknown.length > 0) {
    throw new Error(`Unknown domain(s): ${unknown.join(', ')}`);
  }

  return requested.filter(isDomainName);
}

async function main(): Promise<void> {
  logger.info('');
  logger.info('╔═══════════════════════════════════════════════════╗');
  logger.info('║       Forum Listing Watch                         ║');
  logger.info('╚═══════════════════════════════════════════════════╝');
  logger.info('');

  const domains = selectDomains();
  logger.info(
    { env: config.app.env, mode: isService ? 'service' : 'run-once', domains },
    'Starting application'
  );

  if (domains.length === 0) {
    logger.warn('No listing domains enabled, nothing to do');
    return;
  }

  const launcher = new MonitorLauncher();
  for (const domain of domains) {
    const monitor = new ListingMonitor(getListingSource(domain));
    launcher.register(domain, monitor, (task) =>
      createSchedule(domain, task, config.scheduler)
    );
  }

  // Graceful shutdown: stop scheduling, let runs in progress finish their save
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Shutting down...');
    launcher.stopAll();
    if (launcher.isBusy()) {
      logger.info('Waiting for runs in progress to finish');
    }
    await launcher.waitForIdle();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  if (isRunOnce) {
    let allSucceeded = true;
    for (const domain of launcher.list()) {
      allSucceeded = (await launcher.start(domain, { runOnce: true })) && allSucceeded;
    }
    if (!allSucceeded) {
      process.exitCode = 1;
    }
    return;
  }

  for (const domain of launcher.list()) {
    await launcher.start(domain);
  }

  logger.info({ status: launcher.status() }, 'Service running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
