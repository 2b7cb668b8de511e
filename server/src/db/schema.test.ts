import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq } from 'drizzle-orm';
import { runMigrations } from './migrate.js';
import * as schema from './schema.js';

describe('Members & Duty Assignments Schema', () => {
  let sqlite: Database.Database;
  let db: BetterSQLite3Database<typeof schema>;

  /**
   * Creates a fresh in-memory database with migrations applied.
   */
  function createTestDb() {
    const sqliteDb = new Database(':memory:');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('foreign_keys = ON');
    runMigrations(sqliteDb);
    return { sqlite: sqliteDb, db: drizzle(sqliteDb, { schema }) };
  }

  function columnsOf(table: string) {
    return sqlite
      .prepare<[], { name: string; notnull: number; pk: number; dflt_value: string | null }>(
        `PRAGMA table_info('${table}')`,
      )
      .all();
  }

  beforeEach(() => {
    const testDb = createTestDb();
    sqlite = testDb.sqlite;
    db = testDb.db;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe('Migration Structure', () => {
    it('creates members table with correct columns', () => {
      const columns = columnsOf('members');

      expect(columns.map((col) => col.name)).toEqual([
        'id',
        'username',
        'full_name',
        'coffee_drinker',
        'active',
      ]);
      expect(columns.find((col) => col.name === 'id')?.pk).toBe(1);
      expect(columns.find((col) => col.name === 'username')?.notnull).toBe(1);
      expect(columns.find((col) => col.name === 'full_name')?.notnull).toBe(0);
    });

    it('creates duty_assignments table with correct columns', () => {
      const columns = columnsOf('duty_assignments');

      expect(columns.map((col) => col.name)).toEqual([
        'id',
        'member_id',
        'duty_type',
        'assigned_at',
        'cycle_id',
        'completed',
        'completed_at',
      ]);
      expect(columns.find((col) => col.name === 'member_id')?.notnull).toBe(1);
      expect(columns.find((col) => col.name === 'completed_at')?.notnull).toBe(0);
    });

    it('records applied migrations and skips them on the next run', () => {
      const applied = sqlite
        .prepare<[], { name: string }>('SELECT name FROM _migrations')
        .all()
        .map((row) => row.name);
      expect(applied).toEqual(['0001_create_members_and_duty_assignments.sql']);

      expect(runMigrations(sqlite)).toEqual([]);
    });

    it('returns no migrations for a missing migrations directory', () => {
      expect(runMigrations(sqlite, '/nonexistent/migrations')).toEqual([]);
    });
  });

  describe('Defaults & Constraints', () => {
    it('defaults new members to active coffee drinkers', () => {
      const member = db
        .insert(schema.members)
        .values({ username: 'alice', fullName: 'Alice Example' })
        .returning()
        .get();

      expect(member).toEqual({
        id: 1,
        username: 'alice',
        fullName: 'Alice Example',
        coffeeDrinker: true,
        active: true,
      });
    });

    it('rejects duplicate usernames', () => {
      db.insert(schema.members).values({ username: 'alice', fullName: 'Alice Example' }).run();

      expect(() => {
        db.insert(schema.members).values({ username: 'alice', fullName: 'Another Alice' }).run();
      }).toThrow(/UNIQUE constraint failed: members.username/);
    });

    it('defaults assigned_at to an ISO timestamp and completed to false', () => {
      const member = db
        .insert(schema.members)
        .values({ username: 'alice', fullName: 'Alice Example' })
        .returning()
        .get();

      const assignment = db
        .insert(schema.dutyAssignments)
        .values({ memberId: member.id, dutyType: 'coffee', cycleId: 1 })
        .returning()
        .get();

      expect(assignment.completed).toBe(false);
      expect(assignment.completedAt).toBeNull();
      expect(assignment.assignedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('rejects assignments for a nonexistent member', () => {
      expect(() => {
        db.insert(schema.dutyAssignments)
          .values({ memberId: 42, dutyType: 'fridge', cycleId: 1 })
          .run();
      }).toThrow(/FOREIGN KEY constraint failed/);
    });

    it('rejects unknown duty types at the store level', () => {
      db.insert(schema.members).values({ username: 'alice', fullName: 'Alice Example' }).run();

      expect(() => {
        sqlite
          .prepare(
            "INSERT INTO duty_assignments (member_id, duty_type, cycle_id) VALUES (1, 'dishes', 1)",
          )
          .run();
      }).toThrow(/CHECK constraint failed/);
    });

    it('keeps deactivated members in the table', () => {
      const member = db
        .insert(schema.members)
        .values({ username: 'bob', fullName: 'Bob Example' })
        .returning()
        .get();

      db.update(schema.members)
        .set({ active: false })
        .where(eq(schema.members.id, member.id))
        .run();

      const row = db.select().from(schema.members).where(eq(schema.members.id, member.id)).get();
      expect(row?.active).toBe(false);
    });
  });
});
