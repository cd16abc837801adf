import BetterSqlite3 from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

import { StateCorruptedError } from './errors.js';
import type { WorkflowState } from './models.js';
import { runMigrations } from './migrations.js';
import { decodeWorkflowState, encodeWorkflowState, type StateStore } from './storage.js';

export const DATABASE_FILE = 'state.db';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class SqliteStateStore implements StateStore {
  private db: BetterSqlite3.Database;
  private readonly dbPath: string;

  constructor(stateDir: string, databasePath?: string) {
    this.dbPath = databasePath || path.join(stateDir, DATABASE_FILE);
    const dbDir = path.dirname(this.dbPath);

    try {
      if (this.dbPath !== ':memory:' && !fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }

      this.db = new BetterSqlite3(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      runMigrations(this.db);
    } catch (error) {
      throw new Error(
        `Failed to initialize database at ${this.dbPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  load(repo: string, issueNumber: number): WorkflowState | undefined {
    const row: unknown = this.db
      .prepare('SELECT state FROM workflow_states WHERE repo = ? AND issueNumber = ?')
      .get(repo, issueNumber);
    if (row === undefined) {
      return undefined;
    }
    const location = `${this.dbPath} (${repo}#${issueNumber})`;
    if (!isRecord(row) || typeof row.state !== 'string') {
      throw new StateCorruptedError(location, 'row has no state document');
    }
    return decodeWorkflowState(row.state, location);
  }

  save(repo: string, issueNumber: number, state: WorkflowState): void {
    this.db
      .prepare(`
        INSERT INTO workflow_states (repo, issueNumber, state, step, updatedAt)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT (repo, issueNumber) DO UPDATE SET
          state = excluded.state,
          step = excluded.step,
          updatedAt = excluded.updatedAt
      `)
      .run(repo, issueNumber, encodeWorkflowState(state), state.step, state.updatedAt);
  }

  clear(repo: string, issueNumber: number): void {
    this.db.prepare('DELETE FROM workflow_states WHERE repo = ? AND issueNumber = ?').run(repo, issueNumber);
  }

  close(): void {
    this.db.close();
  }
}
