import * as fs from 'fs';
import * as path from 'path';

import type { WorkflowStep } from './models.js';

export const ERROR_LOG_FILE = 'errors.jsonl';

export interface ErrorRecord {
  timestamp: string;
  repo: string;
  issueNumber: number;
  iteration: number | null;
  step: WorkflowStep | null;
  errorType: string;
  message: string;
  stack: string | null;
}

export interface ErrorContext {
  repo: string;
  issueNumber: number;
  iteration?: number;
  step?: WorkflowStep;
}

/** Append-only JSON-lines sink for failures that end a round or an invocation. */
export class ErrorLog {
  private readonly file: string;

  constructor(logDir: string) {
    this.file = path.join(logDir, ERROR_LOG_FILE);
  }

  getFilePath(): string {
    return this.file;
  }

  record(context: ErrorContext, error: unknown): ErrorRecord {
    const entry: ErrorRecord = {
      timestamp: new Date().toISOString(),
      repo: context.repo,
      issueNumber: context.issueNumber,
      iteration: context.iteration ?? null,
      step: context.step ?? null,
      errorType: error instanceof Error ? error.name : typeof error,
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error && error.stack ? error.stack : null,
    };
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.appendFileSync(this.file, JSON.stringify(entry) + '\n', 'utf-8');
    return entry;
  }
}
