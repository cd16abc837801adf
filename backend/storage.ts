import { StateCorruptedError } from './errors.js';
import {
  WORKFLOW_STEPS,
  type ImplementationPlan,
  type PlannedFile,
  type RestartDecision,
  type ReviewFeedback,
  type ReviewTask,
  type WorkflowState,
} from './models.js';

/** Durable workflow records keyed by (repository, issue). Every save is a full overwrite. */
export interface StateStore {
  load(repo: string, issueNumber: number): WorkflowState | undefined;
  save(repo: string, issueNumber: number, state: WorkflowState): void;
  clear(repo: string, issueNumber: number): void;
  close(): void;
}

export function initialState(): WorkflowState {
  return { iteration: 0, step: 'requirements', feedbackHistory: [], updatedAt: new Date().toISOString() };
}

type Fields = Record<string, unknown>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

class RecordReader {
  constructor(private readonly location: string) {}

  error(detail: string): StateCorruptedError {
    return new StateCorruptedError(this.location, detail);
  }

  object(value: unknown, path: string): Fields {
    if (!isRecord(value)) {
      throw this.error(`${path} must be an object`);
    }
    return value;
  }

  string(value: unknown, path: string): string {
    if (typeof value !== 'string') {
      throw this.error(`${path} must be a string`);
    }
    return value;
  }

  optionalString(value: unknown, path: string): string | undefined {
    return value === undefined || value === null ? undefined : this.string(value, path);
  }

  integer(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw this.error(`${path} must be a non-negative integer`);
    }
    return value;
  }

  optionalInteger(value: unknown, path: string): number | undefined {
    return value === undefined || value === null ? undefined : this.integer(value, path);
  }

  array(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      throw this.error(`${path} must be an array`);
    }
    return value;
  }

  strings(value: unknown, path: string): string[] {
    return this.array(value, path).map((item, index) => this.string(item, `${path}[${index}]`));
  }

  plan(value: unknown, path: string): ImplementationPlan {
    const fields = this.object(value, path);
    const filesToModify = this.array(fields.filesToModify, `${path}.filesToModify`).map((item, index): PlannedFile => {
      const file = this.object(item, `${path}.filesToModify[${index}]`);
      const planned: PlannedFile = { path: this.string(file.path, `${path}.filesToModify[${index}].path`) };
      const reason = this.optionalString(file.reason, `${path}.filesToModify[${index}].reason`);
      if (reason !== undefined) {
        planned.reason = reason;
      }
      return planned;
    });
    return {
      summary: this.string(fields.summary, `${path}.summary`),
      steps: this.strings(fields.steps, `${path}.steps`),
      filesToModify,
      filesToAvoid: this.strings(fields.filesToAvoid, `${path}.filesToAvoid`),
      acceptanceCriteria: this.strings(fields.acceptanceCriteria, `${path}.acceptanceCriteria`),
    };
  }

  feedback(value: unknown, path: string): ReviewFeedback {
    const fields = this.object(value, path);
    const tasks = this.array(fields.tasks, `${path}.tasks`).map((item, index): ReviewTask => {
      const taskPath = `${path}.tasks[${index}]`;
      const raw = this.object(item, taskPath);
      const task: ReviewTask = { message: this.string(raw.message, `${taskPath}.message`) };
      const file = this.optionalString(raw.file, `${taskPath}.file`);
      const line = this.optionalInteger(raw.line, `${taskPath}.line`);
      if (file !== undefined) {
        task.file = file;
      }
      if (line !== undefined) {
        task.line = line;
      }
      return task;
    });
    const feedback: ReviewFeedback = { summary: this.string(fields.summary, `${path}.summary`), tasks };
    const finalComment = this.optionalString(fields.finalComment, `${path}.finalComment`);
    if (finalComment !== undefined) {
      feedback.finalComment = finalComment;
    }
    return feedback;
  }

  decision(value: unknown, path: string): RestartDecision {
    const fields = this.object(value, path);
    const restart = fields.restart;
    if (typeof restart !== 'boolean') {
      throw this.error(`${path}.restart must be a boolean`);
    }
    return {
      restart,
      summary: this.string(fields.summary, `${path}.summary`),
      reason: this.string(fields.reason, `${path}.reason`),
    };
  }
}

/**
 * Rebuilds a typed record from decoded JSON. Anything that does not match the
 * persisted shape raises StateCorruptedError rather than resetting progress.
 */
export function parseWorkflowState(value: unknown, location: string): WorkflowState {
  const reader = new RecordReader(location);
  const fields = reader.object(value, 'state');

  const step = WORKFLOW_STEPS.find(candidate => candidate === fields.step);
  if (!step) {
    throw reader.error(`state.step has unknown value ${JSON.stringify(fields.step)}`);
  }

  const state: WorkflowState = {
    iteration: reader.integer(fields.iteration, 'state.iteration'),
    step,
    feedbackHistory: reader
      .array(fields.feedbackHistory, 'state.feedbackHistory')
      .map((item, index) => reader.feedback(item, `state.feedbackHistory[${index}]`)),
    updatedAt: reader.string(fields.updatedAt, 'state.updatedAt'),
  };

  const prNumber = reader.optionalInteger(fields.prNumber, 'state.prNumber');
  if (prNumber !== undefined) {
    state.prNumber = prNumber;
  }
  if (fields.plan !== undefined && fields.plan !== null) {
    state.plan = reader.plan(fields.plan, 'state.plan');
  }
  const lastIssueCommentId = reader.optionalInteger(fields.lastIssueCommentId, 'state.lastIssueCommentId');
  if (lastIssueCommentId !== undefined) {
    state.lastIssueCommentId = lastIssueCommentId;
  }
  if (fields.lastFeedback !== undefined && fields.lastFeedback !== null) {
    state.lastFeedback = reader.feedback(fields.lastFeedback, 'state.lastFeedback');
  }
  if (fields.commentDecision !== undefined && fields.commentDecision !== null) {
    state.commentDecision = reader.decision(fields.commentDecision, 'state.commentDecision');
  }
  return state;
}

export function decodeWorkflowState(text: string, location: string): WorkflowState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StateCorruptedError(location, error instanceof Error ? error.message : String(error));
  }
  return parseWorkflowState(parsed, location);
}

export function encodeWorkflowState(state: WorkflowState): string {
  return JSON.stringify(state, null, 2);
}
