/**
 * Subscriber Store - durable set of subscriber identities
 *
 * One row per identity. Unsubscribing clears the is_subscribed flag instead
 * of deleting the row, so count() keeps every identity ever subscribed and a
 * returning subscriber does not take a new slot under the cap.
 *
 * Every operation is a single transaction on the shared sql.js database.
 */

import { createDatabase, persisterFor, type Database, type Row, type SqlExecutor } from '../db';
import { CapacityExceededError, InvalidSubscriberIdError, StorageInitError, errorMessage } from '../errors';
import type { Subscriber, SubscriberId, SubscribeOutcome, UnsubscribeOutcome } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('subscribers');

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS subscribers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    subscriber_id TEXT UNIQUE NOT NULL,
    is_subscribed INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER DEFAULT (strftime('%s','now') * 1000)
  );

  CREATE INDEX IF NOT EXISTS idx_subscribers_status ON subscribers(is_subscribed);
`;

/** Upper bound for the configurable subscriber cap. */
export const MAX_SUBSCRIBER_CAP = 10_000;

const SUBSCRIBER_ID_PATTERN = /^\d{1,20}$/;

// =============================================================================
// TYPES
// =============================================================================

export interface SubscriberStore {
  readonly maxSubscribers: number;
  /** Create the backing table if absent. Safe to call repeatedly. */
  ensureInitialized(): void;
  /** Total rows, subscribed or not. */
  count(): number;
  listSubscribed(): Set<SubscriberId>;
  get(id: SubscriberId): Subscriber | undefined;
  isSubscribed(id: SubscriberId): boolean;
  subscribe(id: SubscriberId): SubscribeOutcome;
  unsubscribe(id: SubscriberId): UnsubscribeOutcome;
  close(): void;
}

export interface SubscriberStoreOptions {
  /** Default 10,000, which is also the upper bound. */
  maxSubscribers?: number;
  now?: () => number;
}

// =============================================================================
// HELPERS
// =============================================================================

export function normalizeSubscriberId(id: SubscriberId): SubscriberId {
  const trimmed = id.trim();
  if (!SUBSCRIBER_ID_PATTERN.test(trimmed)) {
    throw new InvalidSubscriberIdError(id);
  }
  return trimmed;
}

function numberColumn(row: Row | undefined, column: string): number {
  const value = row?.[column];
  if (typeof value === 'number') return value;
  throw new Error(`Expected numeric column "${column}", got ${value === undefined ? 'no row' : typeof value}`);
}

function stringColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`Expected text column "${column}"`);
}

function parseSubscriber(row: Row): Subscriber {
  return {
    id: stringColumn(row, 'subscriber_id'),
    subscribed: numberColumn(row, 'is_subscribed') === 1,
    createdAt: new Date(numberColumn(row, 'created_at')),
    updatedAt: new Date(numberColumn(row, 'updated_at')),
  };
}

function resolveCap(requested: number | undefined): number {
  if (requested === undefined) return MAX_SUBSCRIBER_CAP;
  if (!Number.isInteger(requested) || requested < 1) {
    throw new RangeError(`maxSubscribers must be a positive integer, got ${requested}`);
  }
  return Math.min(requested, MAX_SUBSCRIBER_CAP);
}

// =============================================================================
// STORE
// =============================================================================

/**
 * Build a store over an open database. Call ensureInitialized() before use.
 */
export function createSubscriberStore(db: Database, options: SubscriberStoreOptions = {}): SubscriberStore {
  const maxSubscribers = resolveCap(options.maxSubscribers);
  const now = options.now ?? Date.now;

  function countRows(sql: SqlExecutor): number {
    return numberColumn(sql.get('SELECT COUNT(*) AS total FROM subscribers'), 'total');
  }

  function findRow(sql: SqlExecutor, id: SubscriberId): Row | undefined {
    return sql.get(
      'SELECT subscriber_id, is_subscribed, created_at, updated_at FROM subscribers WHERE subscriber_id = ?',
      [id],
    );
  }

  function getSubscriber(id: SubscriberId): Subscriber | undefined {
    const key = normalizeSubscriberId(id);
    return db.read('get', (sql) => {
      const row = findRow(sql, key);
      return row ? parseSubscriber(row) : undefined;
    });
  }

  return {
    maxSubscribers,

    ensureInitialized(): void {
      try {
        db.write('ensureInitialized', (sql) => sql.run(SCHEMA_SQL), { forceSave: true });
      } catch (err) {
        if (err instanceof StorageInitError) throw err;
        throw new StorageInitError(`Failed to initialize subscriber table at ${db.location}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      logger.info({ location: db.location, maxSubscribers }, 'Subscriber store ready');
    },

    count(): number {
      return db.read('count', countRows);
    },

    listSubscribed(): Set<SubscriberId> {
      return db.read('listSubscribed', (sql) => {
        const rows = sql.all('SELECT subscriber_id FROM subscribers WHERE is_subscribed = 1');
        return new Set(rows.map((row) => stringColumn(row, 'subscriber_id')));
      });
    },

    get: getSubscriber,

    isSubscribed(id: SubscriberId): boolean {
      return getSubscriber(id)?.subscribed ?? false;
    },

    subscribe(id: SubscriberId): SubscribeOutcome {
      const key = normalizeSubscriberId(id);
      const outcome = db.write('subscribe', (sql): SubscribeOutcome => {
        const existing = findRow(sql, key);
        if (existing) {
          if (numberColumn(existing, 'is_subscribed') === 1) return 'already-subscribed';
          sql.run('UPDATE subscribers SET is_subscribed = 1, updated_at = ? WHERE subscriber_id = ?', [now(), key]);
          return 'resubscribed';
        }

        if (countRows(sql) >= maxSubscribers) {
          throw new CapacityExceededError(maxSubscribers);
        }

        const timestamp = now();
        sql.run(
          'INSERT INTO subscribers (subscriber_id, is_subscribed, created_at, updated_at) VALUES (?, 1, ?, ?)',
          [key, timestamp, timestamp],
        );
        return 'subscribed';
      });

      if (outcome !== 'already-subscribed') {
        logger.info({ subscriberId: key, outcome }, 'Subscriber added');
      }
      return outcome;
    },

    unsubscribe(id: SubscriberId): UnsubscribeOutcome {
      const key = normalizeSubscriberId(id);
      const changed = db.write('unsubscribe', (sql) =>
        sql.run(
          'UPDATE subscribers SET is_subscribed = 0, updated_at = ? WHERE subscriber_id = ? AND is_subscribed = 1',
          [now(), key],
        ),
      );

      if (changed === 0) return 'not-subscribed';
      logger.info({ subscriberId: key }, 'Subscriber removed');
      return 'unsubscribed';
    },

    close(): void {
      db.close();
    },
  };
}

/**
 * Open (or create) the database at path and return an initialized store.
 * Pass ':memory:' for a store that is never written to disk.
 */
export async function openSubscriberStore(path: string, options: SubscriberStoreOptions = {}): Promise<SubscriberStore> {
  const db = await createDatabase(persisterFor(path));
  const store = createSubscriberStore(db, options);
  try {
    store.ensureInitialized();
  } catch (err) {
    db.close();
    throw err;
  }
  return store;
}
