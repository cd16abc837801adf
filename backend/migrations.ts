import type BetterSqlite3 from 'better-sqlite3';

import { getLogger } from './logger.js';

export interface Migration {
  id: number;
  name: string;
  up: (db: BetterSqlite3.Database) => void;
}

export const migrations: Migration[] = [
  {
    id: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS workflow_states (
          repo TEXT NOT NULL,
          issueNumber INTEGER NOT NULL,
          state TEXT NOT NULL,
          step TEXT NOT NULL,
          updatedAt TEXT NOT NULL,
          PRIMARY KEY (repo, issueNumber)
        );

        CREATE INDEX IF NOT EXISTS idx_workflow_states_step ON workflow_states(step);
      `);
    },
  },
];

/** Applies pending migrations in id order, each inside its own transaction. Returns the ids applied. */
export function runMigrations(db: BetterSqlite3.Database, pending: Migration[] = migrations): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      appliedAt TEXT NOT NULL
    );
  `);

  const applied = new Set(
    db.prepare('SELECT id FROM schema_migrations').pluck().all().filter((id): id is number => typeof id === 'number')
  );
  const record = db.prepare('INSERT INTO schema_migrations (id, name, appliedAt) VALUES (?, ?, ?)');
  const ran: number[] = [];

  for (const migration of [...pending].sort((a, b) => a.id - b.id)) {
    if (applied.has(migration.id)) {
      continue;
    }
    db.transaction(() => {
      migration.up(db);
      record.run(migration.id, migration.name, new Date().toISOString());
    })();
    getLogger()?.info('Migrations', `Applied migration ${migration.id} (${migration.name})`);
    ran.push(migration.id);
  }

  return ran;
}
