/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * The database lives in memory and its image is written to disk after every
 * committed write. A write whose image cannot be saved is undone by reloading
 * the last image that was saved successfully, so memory never runs ahead of
 * disk.
 */

import initSqlJs, {
  type Database as SqlJsDatabase,
  type SqlJsStatic,
  type SqlValue,
} from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { StorageError, StorageInitError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('db');

export type { SqlValue };

export type Row = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Where the database image is loaded from and saved to.
 */
export interface Persister {
  readonly location: string;
  load(): Uint8Array | null;
  save(image: Uint8Array): void;
}

/** Persist to a file, writing a temp file and renaming it into place. */
export function createFilePersister(path: string): Persister {
  return {
    location: path,

    load() {
      if (!existsSync(path)) return null;
      return readFileSync(path);
    },

    save(image) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      const tmpPath = path + '.tmp';
      writeFileSync(tmpPath, image);
      renameSync(tmpPath, path);
    },
  };
}

/** Keep the image in memory. Used for ':memory:' paths and tests. */
export function createMemoryPersister(initial: Uint8Array | null = null): Persister & { image: Uint8Array | null } {
  return {
    location: ':memory:',
    image: initial,

    load() {
      return this.image;
    },

    save(image) {
      this.image = image;
    },
  };
}

export function persisterFor(path: string): Persister {
  return path === ':memory:' ? createMemoryPersister() : createFilePersister(path);
}

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

/**
 * Statement executor handed to read() and write() callbacks. SQL failures
 * surface as StorageError tagged with the operation name.
 */
export interface SqlExecutor {
  /** Run a statement, returning the number of rows it changed. */
  run(sql: string, params?: SqlValue[]): number;
  all(sql: string, params?: SqlValue[]): Row[];
  get(sql: string, params?: SqlValue[]): Row | undefined;
}

export interface WriteOptions {
  /** Save even when no row changed (schema changes are not counted as row changes). */
  forceSave?: boolean;
}

export interface Database {
  readonly location: string;
  /** Run read-only statements. Errors surface as StorageError. */
  read<T>(operation: string, fn: (sql: SqlExecutor) => T): T;
  /**
   * Run fn inside BEGIN/COMMIT and save the image if any row changed. Any
   * error thrown by fn rolls the transaction back and is rethrown unchanged.
   */
  write<T>(operation: string, fn: (sql: SqlExecutor) => T, options?: WriteOptions): T;
  close(): void;
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch((err: unknown) => {
      sqlJsPromise = null;
      throw err;
    });
  }
  return sqlJsPromise;
}

/**
 * Open the database backed by the given persister.
 */
export async function createDatabase(persister: Persister): Promise<Database> {
  let SQL: SqlJsStatic;
  try {
    SQL = await loadSqlJs();
  } catch (err) {
    throw new StorageInitError(`Failed to load SQLite engine: ${errorMessage(err)}`, { cause: err });
  }

  let image: Uint8Array | null;
  try {
    image = persister.load();
  } catch (err) {
    throw new StorageInitError(`Failed to read database at ${persister.location}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  logger.info({ location: persister.location, existing: image !== null }, 'Opening database');

  let db: SqlJsDatabase = image ? new SQL.Database(image) : new SQL.Database();
  // Image of the last state known to be on disk. Restored when a save fails.
  let savedImage: Uint8Array | null = image;
  let closed = false;

  function executor(operation: string): SqlExecutor {
    function wrap<T>(fn: () => T): T {
      if (closed) {
        throw new StorageError(operation, 'Database is closed');
      }
      try {
        return fn();
      } catch (err) {
        throw new StorageError(operation, `${operation} failed: ${errorMessage(err)}`, { cause: err });
      }
    }

    function all(sql: string, params: SqlValue[] = []): Row[] {
      return wrap(() => {
        const stmt = db.prepare(sql);
        try {
          stmt.bind(params);
          const results: Row[] = [];
          while (stmt.step()) {
            results.push(stmt.getAsObject());
          }
          return results;
        } finally {
          stmt.free();
        }
      });
    }

    return {
      run(sql, params = []) {
        return wrap(() => {
          // Without params sql.js executes every statement in the string
          db.run(sql, params.length > 0 ? params : undefined);
          return db.getRowsModified();
        });
      },
      all,
      get(sql, params = []) {
        return all(sql, params)[0];
      },
    };
  }

  function totalChanges(sql: SqlExecutor): number {
    const value = sql.get('SELECT total_changes() AS n')?.n;
    return typeof value === 'number' ? value : 0;
  }

  function restore(): void {
    try {
      db.close();
    } catch (err) {
      logger.warn({ err }, 'Failed to close database before restore');
    }
    db = savedImage ? new SQL.Database(savedImage) : new SQL.Database();
  }

  function persist(operation: string): void {
    const next = db.export();
    try {
      persister.save(next);
    } catch (err) {
      logger.error({ err, operation, location: persister.location }, 'Failed to save database, restoring last saved state');
      restore();
      throw new StorageError(operation, `Failed to save database: ${errorMessage(err)}`, { cause: err });
    }
    savedImage = next;
  }

  return {
    location: persister.location,

    read<T>(operation: string, fn: (sql: SqlExecutor) => T): T {
      try {
        return fn(executor(operation));
      } catch (err) {
        if (err instanceof StorageError) throw err;
        throw new StorageError(operation, `${operation} failed: ${errorMessage(err)}`, { cause: err });
      }
    },

    write<T>(operation: string, fn: (sql: SqlExecutor) => T, options: WriteOptions = {}): T {
      const sql = executor(operation);
      const before = totalChanges(sql);
      sql.run('BEGIN');

      let result: T;
      try {
        result = fn(sql);
        sql.run('COMMIT');
      } catch (err) {
        try {
          db.run('ROLLBACK');
        } catch (rollbackErr) {
          // COMMIT may already have ended the transaction
          logger.debug({ err: rollbackErr, operation }, 'Rollback skipped');
        }
        throw err;
      }

      if (options.forceSave || totalChanges(sql) !== before) {
        persist(operation);
      }
      return result;
    },

    close() {
      if (closed) return;
      closed = true;
      db.close();
      logger.info({ location: persister.location }, 'Database closed');
    },
  };
}
