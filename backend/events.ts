import { EventEmitter } from 'events';

import type { WorkflowStep } from './models.js';

export interface WorkflowEventBase {
  type: string;
  timestamp: number;
  repo: string;
  issueNumber: number;
}

export interface WorkflowStartedEvent extends WorkflowEventBase {
  type: 'workflow_started';
  iteration: number;
  step: WorkflowStep;
}

export interface StepChangedEvent extends WorkflowEventBase {
  type: 'step_changed';
  step: WorkflowStep;
  iteration: number;
  prNumber?: number;
}

export interface RoundStartedEvent extends WorkflowEventBase {
  type: 'round_started';
  iteration: number;
  maxIterations: number;
}

export interface RoundFailedEvent extends WorkflowEventBase {
  type: 'round_failed';
  iteration: number;
  error: string;
}

export interface RestartEvent extends WorkflowEventBase {
  type: 'restart';
  commentId: number;
  reason: string;
}

export interface WorkflowFinishedEvent extends WorkflowEventBase {
  type: 'workflow_finished';
  success: boolean;
  iteration: number;
  prNumber?: number;
}

export interface LogEvent extends WorkflowEventBase {
  type: 'log';
  level: 'info' | 'warn' | 'error' | 'success';
  message: string;
}

export type WorkflowEvent =
  | WorkflowStartedEvent
  | StepChangedEvent
  | RoundStartedEvent
  | RoundFailedEvent
  | RestartEvent
  | WorkflowFinishedEvent
  | LogEvent;

export class WorkflowEventEmitter extends EventEmitter {
  emit(event: 'event', data: WorkflowEvent): boolean {
    return super.emit(event, data);
  }

  on(event: 'event', listener: (data: WorkflowEvent) => void): this {
    return super.on(event, listener);
  }
}
