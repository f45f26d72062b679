/**
 * sitewatch - Discord website availability monitor
 *
 * Entry point: load config, connect, monitor until SIGINT/SIGTERM.
 */

import { createSitewatch } from './app';
import { ConfigError } from './errors';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';

export { createSitewatch, type Sitewatch } from './app';
export { createEngine, type MonitorEngine } from './engine';
export { loadConfig, parseConfig } from './utils/config';
export * from './errors';
export type * from './types';

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function main(configPath?: string): Promise<void> {
  process.on('unhandledRejection', (reason) => logger.error({ reason }, 'Unhandled rejection'));
  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info('Starting sitewatch...');
  const config = await loadConfig(configPath);
  const app = await createSitewatch(config);
  await app.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try {
      await Promise.race([
        app.stop(),
        new Promise<void>((resolve) =>
          setTimeout(() => {
            logger.warn('Shutdown timeout');
            resolve();
          }, SHUTDOWN_TIMEOUT_MS),
        ),
      ]);
    } catch (e) {
      logger.error({ err: e }, 'Shutdown error');
    }
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/** Log a startup failure and exit non-zero. */
export function exitOnFatal(err: unknown): never {
  if (err instanceof ConfigError) {
    logger.error({ issues: err.issues }, err.message);
  } else {
    logger.error({ err }, 'Fatal error');
  }
  process.exit(1);
}

if (require.main === module) {
  main().catch(exitOnFatal);
}
