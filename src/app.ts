/**
 * Process assembly: store + engine + Discord bot
 */

import { createDiscordBot, type DiscordBot } from './channels/discord';
import { createDirectMessageChannel, createDiscordRestClient } from './channels/discord/rest';
import { createEngine, type MonitorEngine } from './engine';
import { openSubscriberStore } from './subscribers/store';
import type { Config } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('app');

export interface Sitewatch {
  engine: MonitorEngine;
  bot: DiscordBot;
  /** Connect to Discord, then start monitoring once the session is ready. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

export async function createSitewatch(config: Config): Promise<Sitewatch> {
  const store = await openSubscriberStore(config.databasePath, { maxSubscribers: config.maxSubscribers });
  const rest = createDiscordRestClient({ token: config.botToken });
  const engine = createEngine(config, { store, channel: createDirectMessageChannel(rest) });
  const bot = createDiscordBot(
    { token: config.botToken, adminId: config.adminId, applicationId: config.applicationId },
    { engine, rest },
  );

  let stopped = false;

  return {
    engine,
    bot,

    async start() {
      await bot.start();
      engine.start();
      logger.info({ urls: config.urlsToCheck.length, subscribers: engine.listSubscribed().size }, 'sitewatch is live');
    },

    async stop() {
      if (stopped) return;
      stopped = true;
      bot.stop();
      await engine.close();
    },
  };
}
