import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createDatabase, createFilePersister, createMemoryPersister, type Database, type Persister, type Row } from './index';
import { StorageError, StorageInitError } from '../errors';

// =============================================================================
// Helpers
// =============================================================================

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

function values(db: Database): Row[] {
  return db.read('list', (sql) => sql.all('SELECT v FROM t ORDER BY rowid'));
}

async function createTableDb(persister: Persister = createMemoryPersister()): Promise<Database> {
  const db = await createDatabase(persister);
  db.write('schema', (sql) => sql.run('CREATE TABLE IF NOT EXISTS t (v TEXT)'), { forceSave: true });
  return db;
}

// =============================================================================
// Transactions
// =============================================================================

describe('Database writes', () => {
  let persister: ReturnType<typeof createMemoryPersister>;
  let db: Database;

  beforeEach(async () => {
    persister = createMemoryPersister();
    db = await createTableDb(persister);
  });

  afterEach(() => {
    db.close();
  });

  it('commits and saves the image when rows change', () => {
    const save = vi.spyOn(persister, 'save');

    const changed = db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['a']));

    expect(changed).toBe(1);
    expect(save).toHaveBeenCalledTimes(1);
    expect(values(db)).toEqual([{ v: 'a' }]);
  });

  it('saves schema changes when forced', () => {
    expect(persister.image).not.toBeNull();
  });

  it('skips the save when nothing changed', () => {
    const save = vi.spyOn(persister, 'save');

    const changed = db.write('noop', (sql) => sql.run('UPDATE t SET v = ? WHERE v = ?', ['x', 'missing']));

    expect(changed).toBe(0);
    expect(save).not.toHaveBeenCalled();
  });

  it('rolls back and rethrows errors thrown inside the transaction', () => {
    db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['a']));
    const boom = new Error('boom');

    const err = catchError(() =>
      db.write('insert', (sql) => {
        sql.run('INSERT INTO t (v) VALUES (?)', ['b']);
        throw boom;
      }),
    );

    expect(err).toBe(boom);
    expect(values(db)).toEqual([{ v: 'a' }]);
  });

  it('reports SQL failures as StorageError tagged with the operation', () => {
    const err = catchError(() => db.write('broken', (sql) => sql.run('INSERT INTO missing (v) VALUES (1)')));

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ operation: 'broken' });
    expect(values(db)).toEqual([]);
  });

  it('restores the last saved state when saving fails', () => {
    db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['a']));
    vi.spyOn(persister, 'save').mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    const err = catchError(() => db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['b'])));

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ operation: 'insert', message: 'Failed to save database: disk full' });
    expect(values(db)).toEqual([{ v: 'a' }]);

    db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['c']));
    expect(values(db)).toEqual([{ v: 'a' }, { v: 'c' }]);
  });
});

// =============================================================================
// Reads and lifecycle
// =============================================================================

describe('Database reads and lifecycle', () => {
  it('wraps read failures as StorageError', async () => {
    const db = await createTableDb();
    const err = catchError(() => db.read('lookup', (sql) => sql.all('SELECT * FROM missing')));

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ operation: 'lookup' });
    db.close();
  });

  it('rejects use after close and tolerates a second close', async () => {
    const db = await createTableDb();
    db.close();

    expect(() => db.read('count', (sql) => sql.get('SELECT 1 AS one'))).toThrow(StorageError);
    expect(() => db.close()).not.toThrow();
  });

  it('reopens from the saved image', async () => {
    const persister = createMemoryPersister();
    const first = await createTableDb(persister);
    first.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['kept']));
    first.close();

    const second = await createDatabase(createMemoryPersister(persister.image));
    expect(values(second)).toEqual([{ v: 'kept' }]);
    second.close();
  });

  it('fails with StorageInitError when the image cannot be read', async () => {
    const persister = {
      location: '/unreadable.db',
      load(): Uint8Array | null {
        throw new Error('EACCES');
      },
      save() {},
    };

    await expect(createDatabase(persister)).rejects.toBeInstanceOf(StorageInitError);
  });
});

// =============================================================================
// File persistence
// =============================================================================

describe('createFilePersister', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sitewatch-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories and replaces the file atomically', async () => {
    const path = join(dir, 'nested', 'subscribers.db');
    const db = await createTableDb(createFilePersister(path));
    db.write('insert', (sql) => sql.run('INSERT INTO t (v) VALUES (?)', ['on-disk']));
    db.close();

    expect(existsSync(path)).toBe(true);
    expect(existsSync(`${path}.tmp`)).toBe(false);

    const reopened = await createDatabase(createFilePersister(path));
    expect(values(reopened)).toEqual([{ v: 'on-disk' }]);
    reopened.close();
  });

  it('loads nothing when the file does not exist', () => {
    expect(createFilePersister(join(dir, 'absent.db')).load()).toBeNull();
  });
});
