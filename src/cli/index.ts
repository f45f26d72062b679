#!/usr/bin/env node
/**
 * sitewatch CLI
 *
 * Commands:
 * - sitewatch start         — Connect to Discord and start monitoring
 * - sitewatch validate      — Check config.yaml and print the effective settings
 * - sitewatch probe [urls]  — Probe URLs once and print the results
 * - sitewatch subscribers   — Show subscriber counts from the database
 */

import { Command } from 'commander';
import { ConfigError, errorMessage } from '../errors';
import { exitOnFatal, main } from '../index';
import { probeUrl } from '../monitoring/probe';
import { openSubscriberStore, type SubscriberStore } from '../subscribers/store';
import { loadConfig } from '../utils/config';
import type { Config } from '../types';

const program = new Command();

program
  .name('sitewatch')
  .description('Discord bot that notifies subscribers when websites become reachable')
  .version('0.1.0');

async function loadConfigOrExit(path?: string): Promise<Config> {
  try {
    return await loadConfig(path);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`\n  \x1b[31mError:\x1b[0m ${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }
}

// ============================================================================
// start
// ============================================================================
program
  .command('start')
  .description('Connect to Discord and start monitoring')
  .option('-c, --config <path>', 'Path to config.yaml')
  .action(async (options: { config?: string }) => {
    await main(options.config).catch(exitOnFatal);
  });

// ============================================================================
// validate
// ============================================================================
program
  .command('validate')
  .description('Validate the configuration file')
  .option('-c, --config <path>', 'Path to config.yaml')
  .action(async (options: { config?: string }) => {
    const config = await loadConfigOrExit(options.config);

    console.log('\n\x1b[1mConfiguration OK\x1b[0m\n');
    console.log(`  Database:        ${config.databasePath}`);
    console.log(`  Check delay:     ${config.urlCheckDelay}s`);
    console.log(`  Probe:           ${config.probe.method}, ${config.probe.timeout}s timeout`);
    console.log(`  Notify on:       ${config.notifyOn} (${config.dispatchMode} dispatch)`);
    console.log(`  Max subscribers: ${config.maxSubscribers}`);
    console.log(`  Slash commands:  ${config.applicationId ? `application ${config.applicationId}` : 'application id from READY'}`);
    console.log(`\n  URLs (${config.urlsToCheck.length}):`);
    for (const url of config.urlsToCheck) {
      console.log(`    - ${url}`);
    }
    console.log('');
  });

// ============================================================================
// probe
// ============================================================================
program
  .command('probe')
  .argument('[urls...]', 'URLs to probe (default: urls_to_check from the config)')
  .description('Probe URLs once without notifying anyone')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('-t, --timeout <seconds>', 'Probe timeout in seconds')
  .action(async (urls: string[], options: { config?: string; timeout?: string }) => {
    let targets = urls;
    let timeoutSeconds = 10;
    let method: Config['probe']['method'] = 'HEAD';

    if (targets.length === 0) {
      const config = await loadConfigOrExit(options.config);
      targets = config.urlsToCheck;
      timeoutSeconds = config.probe.timeout;
      method = config.probe.method;
    }
    if (options.timeout) {
      const parsed = Number(options.timeout);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        console.error(`\n  \x1b[31mError:\x1b[0m --timeout must be a positive number\n`);
        process.exit(1);
      }
      timeoutSeconds = parsed;
    }

    console.log('');
    let down = 0;
    for (const url of targets) {
      const result = await probeUrl(url, { timeoutMs: timeoutSeconds * 1000, method });
      if (result.available) {
        console.log(`  \x1b[32m✓\x1b[0m ${url} \x1b[90m${result.status} in ${result.durationMs}ms\x1b[0m`);
      } else {
        down++;
        console.log(`  \x1b[31m✗\x1b[0m ${url} \x1b[90m${result.error ?? 'unavailable'}\x1b[0m`);
      }
    }
    console.log(`\n  ${targets.length - down}/${targets.length} available\n`);
    if (down > 0) process.exitCode = 2;
  });

// ============================================================================
// subscribers
// ============================================================================
program
  .command('subscribers')
  .description('Show subscriber counts')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--list', 'Print every subscribed user id')
  .action(async (options: { config?: string; list?: boolean }) => {
    const config = await loadConfigOrExit(options.config);
    let store: SubscriberStore;
    try {
      store = await openSubscriberStore(config.databasePath, { maxSubscribers: config.maxSubscribers });
    } catch (err) {
      console.error(`\n  \x1b[31mError:\x1b[0m ${errorMessage(err)}\n`);
      process.exit(1);
    }

    try {
      const subscribed = store.listSubscribed();
      console.log(`\n  Subscribed: ${subscribed.size}`);
      console.log(`  Known users: ${store.count()} / ${store.maxSubscribers}`);
      if (options.list) {
        console.log('');
        for (const id of subscribed) console.log(`    ${id}`);
      }
      console.log('');
    } finally {
      store.close();
    }
  });

program.parseAsync().catch(exitOnFatal);
