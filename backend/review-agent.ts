import type { CodeHostClient } from './github-client.js';
import type { LLMClient } from './llm-client.js';
import { getLogger } from './logger.js';
import type {
  ImplementationPlan,
  PlannedFile,
  PullRequestReview,
  PullRequestReviewIssue,
  RestartDecision,
  ReviewDecision,
  ReviewFeedback,
  ReviewTask,
} from './models.js';
import { PROMPTS, SYSTEM_PROMPTS } from './prompts.js';
import { isJsonObject, type JsonObject, type JsonValue } from './structured-output.js';

const REVIEW_DECISIONS: readonly ReviewDecision[] = ['APPROVE', 'REQUEST_CHANGES', 'COMMENT'];

const text = (value: JsonValue | undefined): string =>
  typeof value === 'string' ? value.trim() : '';

const optionalText = (value: JsonValue | undefined): string | undefined => {
  const result = text(value);
  return result ? result : undefined;
};

const lineNumber = (value: JsonValue | undefined): number | undefined => {
  const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};

const stringList = (value: JsonValue | undefined): string[] => {
  if (typeof value === 'string') {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map(item => (typeof item === 'string' ? item.trim() : JSON.stringify(item))).filter(Boolean);
};

export function normalizePlan(raw: JsonObject): ImplementationPlan {
  const rawFiles = raw.files_to_modify ?? raw.filesToModify;
  const filesToModify: PlannedFile[] = [];
  if (Array.isArray(rawFiles)) {
    for (const entry of rawFiles) {
      if (typeof entry === 'string' && entry.trim()) {
        filesToModify.push({ path: entry.trim() });
      } else if (isJsonObject(entry) && text(entry.path)) {
        filesToModify.push({ path: text(entry.path), reason: optionalText(entry.reason) });
      }
    }
  }

  return {
    summary: text(raw.summary),
    steps: stringList(raw.steps ?? raw.plan),
    filesToModify,
    filesToAvoid: stringList(raw.files_to_avoid ?? raw.filesToAvoid),
    acceptanceCriteria: stringList(raw.acceptance_criteria ?? raw.acceptanceCriteria),
  };
}

export function normalizeFeedback(raw: JsonObject): ReviewFeedback {
  const tasks: ReviewTask[] = [];
  if (Array.isArray(raw.tasks)) {
    for (const entry of raw.tasks) {
      if (typeof entry === 'string' && entry.trim()) {
        tasks.push({ message: entry.trim() });
        continue;
      }
      if (!isJsonObject(entry)) {
        continue;
      }
      const message = text(entry.message) || text(entry.description);
      if (!message) {
        continue;
      }
      const task: ReviewTask = { message };
      const file = optionalText(entry.file);
      const line = lineNumber(entry.line);
      if (file) {
        task.file = file;
      }
      if (line !== undefined) {
        task.line = line;
      }
      tasks.push(task);
    }
  }

  const feedback: ReviewFeedback = { summary: text(raw.summary), tasks };
  const finalComment = optionalText(raw.final_comment ?? raw.finalComment);
  if (finalComment) {
    feedback.finalComment = finalComment;
  }
  return feedback;
}

export function normalizeRestartDecision(raw: JsonObject): RestartDecision {
  const restart = raw.restart === true || (typeof raw.restart === 'string' && raw.restart.trim().toLowerCase() === 'true');
  return { restart, summary: text(raw.summary), reason: text(raw.reason) };
}

export function normalizePullRequestReview(raw: JsonObject): PullRequestReview {
  const requested = text(raw.decision).toUpperCase();
  const decision = REVIEW_DECISIONS.find(candidate => candidate === requested) ?? 'COMMENT';
  const issues: PullRequestReviewIssue[] = [];
  if (Array.isArray(raw.issues)) {
    for (const entry of raw.issues) {
      if (!isJsonObject(entry)) {
        continue;
      }
      const message = text(entry.message) || text(entry.description);
      if (!message) {
        continue;
      }
      issues.push({
        severity: text(entry.severity) || 'info',
        message,
        file: optionalText(entry.file),
        line: lineNumber(entry.line),
      });
    }
  }
  return { decision, summary: text(raw.summary), issues };
}

/** Comment body for one review round: the final comment, else summary plus task bullets. */
export function formatReviewComment(feedback: ReviewFeedback): string {
  if (feedback.finalComment) {
    return feedback.finalComment;
  }
  const lines = feedback.summary ? [feedback.summary] : [];
  for (const task of feedback.tasks) {
    lines.push(task.file && task.line ? `- ${task.message} (${task.file}:${task.line})` : `- ${task.message}`);
  }
  const body = lines.filter(Boolean).join('\n');
  return body || 'Review completed.';
}

export function formatPullRequestReview(review: PullRequestReview): string {
  const lines = review.summary ? [review.summary] : [];
  for (const issue of review.issues) {
    const location = issue.file ? ` (${issue.file}${issue.line ? `:${issue.line}` : ''})` : '';
    lines.push(`- ${issue.severity}: ${issue.message}${location}`);
  }
  return lines.join('\n') || 'Review completed.';
}

/** Reviewer role: plans, per-round reviews, comment triage and standalone PR reviews. */
export class ReviewAgent {
  constructor(
    private readonly llm: LLMClient,
    private readonly github?: CodeHostClient,
  ) {}

  async generatePlan(requirements: string, repoStructure: string, relevantFiles: string): Promise<ImplementationPlan> {
    const raw = await this.llm.generateStructured(
      PROMPTS.implementationPlan(requirements, repoStructure, relevantFiles),
      SYSTEM_PROMPTS.json,
    );
    const plan = normalizePlan(raw);
    getLogger()?.info('ReviewAgent', `Plan generated with ${plan.steps.length} step(s)`);
    return plan;
  }

  async reviewChanges(
    requirements: string,
    plan: ImplementationPlan | undefined,
    diff: string,
    feedbackHistory: ReviewFeedback[],
  ): Promise<ReviewFeedback> {
    const raw = await this.llm.generateStructured(
      PROMPTS.reviewFeedback(
        requirements,
        JSON.stringify(plan ?? null, null, 2),
        diff,
        JSON.stringify(feedbackHistory, null, 2),
      ),
      SYSTEM_PROMPTS.json,
    );
    return normalizeFeedback(raw);
  }

  async decideRestart(
    issueContext: string,
    commentBody: string,
    plan: ImplementationPlan | undefined,
    feedbackHistory: ReviewFeedback[],
  ): Promise<RestartDecision> {
    const raw = await this.llm.generateStructured(
      PROMPTS.issueCommentReview(
        issueContext,
        commentBody,
        plan ? JSON.stringify(plan, null, 2) : 'null',
        JSON.stringify(feedbackHistory, null, 2),
      ),
      SYSTEM_PROMPTS.json,
    );
    return normalizeRestartDecision(raw);
  }

  async reviewPullRequest(repo: string, prNumber: number, description: string): Promise<PullRequestReview> {
    const github = this.requireGitHub();
    const diff = await github.getPullRequestDiff(repo, prNumber);
    const runs = await github.listWorkflowRunsForPull(repo, prNumber);
    const raw = await this.llm.generateStructured(
      PROMPTS.pullRequestReview(description, diff, JSON.stringify(runs, null, 2)),
      SYSTEM_PROMPTS.json,
    );
    return normalizePullRequestReview(raw);
  }

  async postReview(repo: string, prNumber: number, review: PullRequestReview): Promise<void> {
    await this.requireGitHub().createReview(repo, prNumber, review.decision, formatPullRequestReview(review));
    getLogger()?.info('ReviewAgent', `Posted ${review.decision} review on ${repo}#${prNumber}`);
  }

  private requireGitHub(): CodeHostClient {
    if (!this.github) {
      throw new Error('ReviewAgent was created without a GitHub client');
    }
    return this.github;
  }
}
