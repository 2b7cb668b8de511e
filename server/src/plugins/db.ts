import fp from 'fastify-plugin';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import { StoreError } from '../errors/AppError.js';
import { createDatabaseUrlResolver, toSqlitePath } from '../services/databaseUrlService.js';
import type { DatabaseUrlResolver } from '../services/databaseUrlService.js';

export type DbType = BetterSQLite3Database<typeof schema>;

export interface DbPluginOptions {
  /** Overrides the resolver picked from configuration. */
  databaseUrlResolver?: DatabaseUrlResolver;
}

// Type augmentation: makes fastify.db available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: DbType & { $client: Database.Database };
  }
}

export default fp<DbPluginOptions>(
  async function dbPlugin(fastify, opts) {
    const resolver = opts.databaseUrlResolver ?? createDatabaseUrlResolver(fastify.config);
    const { url, source } = await resolver.resolve();
    const dbPath = toSqlitePath(url);

    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    fastify.log.info({ source }, 'Opening SQLite database');

    let sqlite: Database.Database;
    try {
      sqlite = new Database(dbPath);
    } catch (err) {
      throw new StoreError('Could not open database', err);
    }

    // WAL for concurrent readers; foreign keys are off by default in SQLite
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    fastify.log.info({ applied }, 'Database migrations completed');

    const db = drizzle(sqlite, { schema });

    fastify.decorate('db', db);

    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);
