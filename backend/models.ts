export type WorkflowStep =
  | 'requirements'
  | 'analyze'
  | 'plan'
  | 'apply'
  | 'pr'
  | 'final_review'
  | 'completed'
  | 'restart';

export const WORKFLOW_STEPS: readonly WorkflowStep[] = [
  'requirements',
  'analyze',
  'plan',
  'apply',
  'pr',
  'final_review',
  'completed',
  'restart',
];

export interface PlannedFile {
  path: string;
  reason?: string;
}

export interface ImplementationPlan {
  summary: string;
  steps: string[];
  filesToModify: PlannedFile[];
  filesToAvoid: string[];
  acceptanceCriteria: string[];
}

export interface ReviewTask {
  message: string;
  file?: string;
  line?: number;
}

export interface ReviewFeedback {
  summary: string;
  tasks: ReviewTask[];
  finalComment?: string;
}

export interface RestartDecision {
  restart: boolean;
  summary: string;
  reason: string;
}

export interface WorkflowState {
  iteration: number;
  prNumber?: number;
  step: WorkflowStep;
  plan?: ImplementationPlan;
  feedbackHistory: ReviewFeedback[];
  lastIssueCommentId?: number;
  /** Last review posted to the pull request. */
  lastFeedback?: ReviewFeedback;
  commentDecision?: RestartDecision;
  updatedAt: string;
}

export type FileOperation =
  | { action: 'modify'; path: string; content: string }
  | { action: 'delete'; path: string };

/**
 * A file entry as decoded from model output. Entries the orchestrator cannot
 * act on are kept as `unrecognized` so they can be logged and skipped.
 */
export type FileEntry =
  | FileOperation
  | { action: 'unrecognized'; raw: unknown; reason: string };

export interface ChangeSet {
  files: FileOperation[];
  commitMessage: string;
}

export interface IssueComment {
  id: number;
  body: string;
  author?: string;
}

export interface IssueDetails {
  number: number;
  title: string;
  body: string;
  state: string;
}

export interface PullRequestRef {
  number: number;
  url?: string;
  title?: string;
  body?: string;
  headRef?: string;
}

export type ReviewDecision = 'APPROVE' | 'REQUEST_CHANGES' | 'COMMENT';

export interface PullRequestReviewIssue {
  severity: string;
  message: string;
  file?: string;
  line?: number;
}

export interface PullRequestReview {
  decision: ReviewDecision;
  summary: string;
  issues: PullRequestReviewIssue[];
}

export interface WorkflowRunSummary {
  id: number;
  name: string;
  status: string;
  conclusion: string | null;
  url?: string;
}
