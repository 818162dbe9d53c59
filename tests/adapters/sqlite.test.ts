/**
 * SQLite Adapter Tests
 * Run against in-memory databases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  DEFAULT_TABLE_NAME,
  SqliteAdapter,
  isValidTableName,
  type SqliteMigration,
} from '../../src/adapters/sqlite.js';
import { Migrator } from '../../src/migrator/migrator.js';
import { MigratorError } from '../../src/migrator/errors.js';
import { defineMigration } from '../../src/migrator/migration.js';
import { describeAdapterSuite } from '../helpers/adapter-suite.js';
import { silentLogger, testId } from '../helpers/fixtures.js';

const openDatabases: Database.Database[] = [];

describeAdapterSuite<SqliteMigration>('sqlite', {
  create: () => {
    const db = new Database(':memory:');
    openDatabases.push(db);
    const adapter = new SqliteAdapter(db);
    adapter.init();
    return adapter;
  },
  mock: (id, dependencies) => defineMigration({ id, dependencies, description: 'No-op' }),
  cleanup: () => {
    for (const db of openDatabases.splice(0)) {
      db.close();
    }
  },
});

function tableExists(db: Database.Database, name: string): boolean {
  const row = db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`).get(name);
  return row !== undefined;
}

const createUsers = defineMigration({
  id: testId(1),
  description: 'Create users table',
  up: (db: Database.Database) => {
    db.exec('CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL)');
  },
  down: (db: Database.Database) => {
    db.exec('DROP TABLE users');
  },
});

const addEmail = defineMigration({
  id: testId(2),
  dependencies: [testId(1)],
  description: 'Add email column',
  up: (db: Database.Database) => {
    db.exec('ALTER TABLE users ADD COLUMN email TEXT');
  },
  down: (db: Database.Database) => {
    db.exec('ALTER TABLE users DROP COLUMN email');
  },
});

describe('SqliteAdapter', () => {
  let db: Database.Database;
  let adapter: SqliteAdapter;

  beforeEach(() => {
    db = new Database(':memory:');
    adapter = new SqliteAdapter(db);
    adapter.init();
  });

  afterEach(() => {
    db.close();
  });

  describe('init', () => {
    it('should create the bookkeeping table', () => {
      expect(adapter.tableName).toBe(DEFAULT_TABLE_NAME);
      expect(tableExists(db, '_migraph_migrations')).toBe(true);
    });

    it('should be safe to call repeatedly', async () => {
      await adapter.applyMigration(createUsers);
      adapter.init();
      expect(adapter.appliedMigrations()).toEqual(new Set([testId(1)]));
    });

    it('should use a custom table name', () => {
      const custom = new SqliteAdapter(db, { tableName: 'schema_history' });
      custom.init();
      expect(tableExists(db, 'schema_history')).toBe(true);
      expect(custom.appliedMigrations().size).toBe(0);
    });

    it('should reject table names that are not plain identifiers', () => {
      expect(() => new SqliteAdapter(db, { tableName: 'x; DROP TABLE users' })).toThrow(
        'Invalid migration table name: "x; DROP TABLE users"'
      );
    });
  });

  describe('isValidTableName', () => {
    it('should accept identifiers only', () => {
      expect(isValidTableName('_migraph_migrations')).toBe(true);
      expect(isValidTableName('Migrations2')).toBe(true);
      expect(isValidTableName('2migrations')).toBe(false);
      expect(isValidTableName('schema.migrations')).toBe(false);
      expect(isValidTableName('')).toBe(false);
    });
  });

  describe('applyMigration / revertMigration', () => {
    it('should run the migration and record it', async () => {
      await adapter.applyMigration(createUsers);

      expect(tableExists(db, 'users')).toBe(true);
      expect(adapter.appliedMigrations()).toEqual(new Set([testId(1)]));
    });

    it('should undo the migration and forget it', async () => {
      await adapter.applyMigration(createUsers);
      await adapter.revertMigration(createUsers);

      expect(tableExists(db, 'users')).toBe(false);
      expect(adapter.appliedMigrations().size).toBe(0);
    });

    it('should roll back schema changes when the migration fails', async () => {
      const broken = defineMigration({
        id: testId(3),
        description: 'Create then fail',
        up: (conn: Database.Database) => {
          conn.exec('CREATE TABLE audit (id INTEGER PRIMARY KEY)');
          throw new Error('constraint check failed');
        },
      });

      await expect(adapter.applyMigration(broken)).rejects.toThrow('constraint check failed');

      expect(tableExists(db, 'audit')).toBe(false);
      expect(adapter.appliedMigrations().size).toBe(0);
      expect(db.inTransaction).toBe(false);
    });

    it('should refuse to record the same migration twice', async () => {
      await adapter.applyMigration(defineMigration({ id: testId(4), description: 'No-op' }));

      await expect(
        adapter.applyMigration(defineMigration({ id: testId(4), description: 'No-op' }))
      ).rejects.toThrow('UNIQUE constraint failed');
      expect(db.inTransaction).toBe(false);
    });

    it('should treat migrations without actions as bookkeeping only', async () => {
      const marker = defineMigration({ id: testId(5), description: 'Marker' });

      await adapter.applyMigration(marker);
      expect(adapter.appliedMigrations()).toEqual(new Set([testId(5)]));

      await adapter.revertMigration(marker);
      expect(adapter.appliedMigrations().size).toBe(0);
    });
  });

  describe('appliedRecords', () => {
    it('should list records oldest first with timestamps', async () => {
      await adapter.applyMigration(createUsers);
      await adapter.applyMigration(addEmail);

      const records = adapter.appliedRecords();

      expect(records.map(record => record.id)).toEqual([testId(1), testId(2)]);
      for (const record of records) {
        expect(Number.isNaN(Date.parse(record.appliedAt))).toBe(false);
      }
    });
  });

  describe('with a migrator', () => {
    it('should evolve the schema up and down', async () => {
      const migrator = new Migrator<SqliteMigration>(adapter, { logger: silentLogger });
      migrator.registerMultiple([addEmail, createUsers]);

      await migrator.up();
      db.prepare('INSERT INTO users (name, email) VALUES (?, ?)').run('alice', 'alice@example.com');
      expect(db.prepare('SELECT COUNT(*) AS count FROM users').get()).toEqual({ count: 1 });

      await migrator.down(testId(1));
      expect(() => db.prepare('SELECT email FROM users').all()).toThrow('no such column: email');

      await migrator.down();
      expect(tableExists(db, 'users')).toBe(false);
    });

    it('should attribute a failing statement to its migration', async () => {
      const migrator = new Migrator<SqliteMigration>(adapter, { logger: silentLogger });
      migrator.register(createUsers);
      migrator.register(
        defineMigration({
          id: testId(6),
          dependencies: [testId(1)],
          description: 'Reference missing table',
          up: (conn: Database.Database) => {
            conn.exec('INSERT INTO accounts (id) VALUES (1)');
          },
        })
      );

      const error = await migrator.up().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MigratorError);
      expect(error).toMatchObject({ migrationId: testId(6) });
      expect(adapter.appliedMigrations()).toEqual(new Set([testId(1)]));
    });
  });
});
