import * as fs from 'fs';
import * as path from 'path';

import { getLogger } from './logger.js';
import type { WorkflowState } from './models.js';
import { decodeWorkflowState, encodeWorkflowState, type StateStore } from './storage.js';

/** One JSON document per (repository, issue), replaced atomically on every save. */
export class FileStateStore implements StateStore {
  constructor(private readonly stateDir: string) {}

  statePath(repo: string, issueNumber: number): string {
    return path.join(this.stateDir, `${repo.replace(/\//g, '_')}_${issueNumber}.json`);
  }

  load(repo: string, issueNumber: number): WorkflowState | undefined {
    const file = this.statePath(repo, issueNumber);
    if (!fs.existsSync(file)) {
      return undefined;
    }
    return decodeWorkflowState(fs.readFileSync(file, 'utf-8'), file);
  }

  save(repo: string, issueNumber: number, state: WorkflowState): void {
    fs.mkdirSync(this.stateDir, { recursive: true });
    const file = this.statePath(repo, issueNumber);
    const temporary = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(temporary, encodeWorkflowState(state), 'utf-8');
    fs.renameSync(temporary, file);
    getLogger()?.debug('FileStateStore', `Saved ${repo}#${issueNumber} at step ${state.step}`);
  }

  clear(repo: string, issueNumber: number): void {
    fs.rmSync(this.statePath(repo, issueNumber), { force: true });
  }

  close(): void {
    // Nothing is held open between calls.
  }
}
