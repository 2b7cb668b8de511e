import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { loadConfig } from '../plugins/config.js';
import { createDatabaseUrlResolver, toSqlitePath } from '../services/databaseUrlService.js';
import { runMigrations } from './migrate.js';

// Run migrations standalone (without starting the server)
async function main() {
  const config = loadConfig(process.env);
  const resolved = await createDatabaseUrlResolver(config).resolve();
  const dbPath = toSqlitePath(resolved.url);

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  try {
    const applied = runMigrations(db);
    for (const file of applied) {
      console.warn(`Applied migration: ${file}`);
    }
    console.warn(`Migrations completed successfully (${applied.length} applied)`);
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

main().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exitCode = 1;
});
