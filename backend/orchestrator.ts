import { isDeepStrictEqual } from 'util';

import { applyChangeSet, decodeChangeSet } from './change-set.js';
import type { AgentConfig } from './config.js';
import { ErrorLog } from './error-log.js';
import { GitCommandError, IterationLimitError, PermissionError, describeError } from './errors.js';
import { WorkflowEventEmitter, type WorkflowEvent } from './events.js';
import { buildContextBundle, type ContextBundle } from './file-selection.js';
import type { CodeHostClient } from './github-client.js';
import type { LLMClient } from './llm-client.js';
import { getLogger } from './logger.js';
import type { ChangeSet, PullRequestRef, WorkflowState } from './models.js';
import { PROMPTS, SYSTEM_PROMPTS } from './prompts.js';
import { RestartGate, buildIssueContext } from './restart-gate.js';
import { ReviewAgent, formatReviewComment } from './review-agent.js';
import { initialState, type StateStore } from './storage.js';
import { cloneWithGit, type WorkingCopy, type WorkingCopyFactory } from './working-copy.js';

export interface IssueWorkflowConfig {
  github: CodeHostClient;
  llm: LLMClient;
  config: AgentConfig;
  store: StateStore;
  errorLog?: ErrorLog;
  reviewer?: ReviewAgent;
  workingCopyFactory?: WorkingCopyFactory;
  eventEmitter?: WorkflowEventEmitter;
  silent?: boolean;
}

interface WorkflowRun {
  repo: string;
  issueNumber: number;
  state: WorkflowState;
}

interface RoundContext {
  run: WorkflowRun;
  branch: string;
  requirements: string;
  bundle: ContextBundle;
  workingCopy: WorkingCopy;
}

/**
 * Drives one issue from its description to a reviewed pull request. Every
 * transition is checkpointed to the state store before the next side effect,
 * so an interrupted invocation resumes from the last recorded step.
 */
export class IssueWorkflow {
  private github: CodeHostClient;
  private llm: LLMClient;
  private config: AgentConfig;
  private store: StateStore;
  private errorLog: ErrorLog;
  private reviewer: ReviewAgent;
  private restartGate: RestartGate;
  private workingCopyFactory: WorkingCopyFactory;
  private eventEmitter: WorkflowEventEmitter;
  private silent: boolean;

  constructor(options: IssueWorkflowConfig) {
    this.github = options.github;
    this.llm = options.llm;
    this.config = options.config;
    this.store = options.store;
    this.errorLog = options.errorLog ?? new ErrorLog(options.config.agent.logDir);
    this.reviewer = options.reviewer ?? new ReviewAgent(options.llm, options.github);
    this.restartGate = new RestartGate(this.reviewer);
    this.workingCopyFactory = options.workingCopyFactory ?? cloneWithGit;
    this.eventEmitter = options.eventEmitter ?? new WorkflowEventEmitter();
    this.silent = options.silent ?? false;
  }

  branchFor(issueNumber: number): string {
    return `${this.config.agent.branchPrefix}${issueNumber}`;
  }

  async processIssue(repo: string, issueNumber: number): Promise<boolean> {
    const run: WorkflowRun = { repo, issueNumber, state: initialState() };

    try {
      run.state = this.store.load(repo, issueNumber) ?? initialState();
      this.emitEvent({
        type: 'workflow_started',
        timestamp: Date.now(),
        repo,
        issueNumber,
        iteration: run.state.iteration,
        step: run.state.step,
      });

      const success = await this.execute(run);
      this.finish(run, success);
      return success;
    } catch (error) {
      this.log(run, `Issue processing failed for ${repo}#${issueNumber}: ${describeError(error)}`, 'error');
      this.errorLog.record(
        { repo, issueNumber, iteration: run.state.iteration, step: run.state.step },
        error,
      );
      this.finish(run, false);
      return false;
    }
  }

  private async execute(run: WorkflowRun): Promise<boolean> {
    const { repo, issueNumber } = run;
    const maxIterations = this.config.agent.maxIterations;

    const issue = await this.github.getIssue(repo, issueNumber);
    const comments = await this.github.listIssueComments(repo, issueNumber);
    const issueContext = buildIssueContext(issue.body, comments);
    const latestComment = comments.length > 0 ? comments[comments.length - 1] : undefined;

    const gate = await this.restartGate.evaluate({
      issueContext,
      latestComment,
      lastIssueCommentId: run.state.lastIssueCommentId,
      plan: run.state.plan,
      feedbackHistory: run.state.feedbackHistory,
    });

    if (gate.evaluated && gate.decision.restart) {
      this.checkpoint(run, {
        iteration: 0,
        step: 'restart',
        plan: undefined,
        feedbackHistory: [],
        lastFeedback: undefined,
        lastIssueCommentId: gate.commentId,
        commentDecision: gate.decision,
      });
      this.emitEvent({
        type: 'restart',
        timestamp: Date.now(),
        repo,
        issueNumber,
        commentId: gate.commentId,
        reason: gate.decision.reason,
      });
      this.log(run, `Comment ${gate.commentId} requires a restart: ${gate.decision.reason || gate.decision.summary}`, 'warn');
      return true;
    }

    if (gate.evaluated) {
      this.persist(run, { lastIssueCommentId: gate.commentId, commentDecision: gate.decision });
    }

    if (run.state.step === 'completed') {
      this.log(run, `Issue ${repo}#${issueNumber} is already completed; nothing to do`);
      return true;
    }

    if (run.state.iteration >= maxIterations) {
      throw new IterationLimitError(issueNumber, maxIterations);
    }

    if (!(await this.github.canPush(repo))) {
      throw new PermissionError(repo);
    }

    const branch = this.branchFor(issueNumber);
    const existing = await this.github.findOpenPullByHead(repo, branch);
    this.checkpoint(run, {
      step: 'requirements',
      prNumber: existing?.number ?? run.state.prNumber,
      lastIssueCommentId: latestComment?.id ?? run.state.lastIssueCommentId,
    });

    const requirements = await this.analyzeRequirements(run, issueContext);

    const workingCopy = this.workingCopyFactory({
      repo,
      remoteUrl: `${this.config.github.cloneBaseUrl.replace(/\/+$/, '')}/${repo}`,
      baseBranch: this.config.agent.baseBranch,
      token: await this.github.accessToken(repo),
      authorName: this.config.git.authorName,
      authorEmail: this.config.git.authorEmail,
    });

    try {
      this.checkpoint(run, { step: 'analyze' });
      const bundle = buildContextBundle(workingCopy, issueContext);

      if (!run.state.plan) {
        const plan = await this.reviewer.generatePlan(requirements, bundle.repoStructure, bundle.relevantFiles);
        this.checkpoint(run, { step: 'plan', plan });
      }

      const context: RoundContext = { run, branch, requirements, bundle, workingCopy };
      while (run.state.iteration < maxIterations) {
        this.checkpoint(run, { iteration: run.state.iteration + 1, step: 'apply' });
        this.emitEvent({
          type: 'round_started',
          timestamp: Date.now(),
          repo,
          issueNumber,
          iteration: run.state.iteration,
          maxIterations,
        });
        this.log(run, `Round ${run.state.iteration}/${maxIterations} for ${repo}#${issueNumber}`);

        try {
          await this.runRound(context);
          this.log(run, `Issue ${repo}#${issueNumber} completed in round ${run.state.iteration}`, 'success');
          return true;
        } catch (error) {
          this.log(run, `Round ${run.state.iteration} failed at step ${run.state.step}: ${describeError(error)}`, 'error');
          this.errorLog.record(
            { repo, issueNumber, iteration: run.state.iteration, step: run.state.step },
            error,
          );
          this.emitEvent({
            type: 'round_failed',
            timestamp: Date.now(),
            repo,
            issueNumber,
            iteration: run.state.iteration,
            error: describeError(error),
          });
        }
      }

      this.log(run, `Iteration budget of ${maxIterations} exhausted for ${repo}#${issueNumber}`, 'error');
      return false;
    } finally {
      workingCopy.cleanup();
    }
  }

  private async runRound(context: RoundContext): Promise<void> {
    const { run, branch, requirements, bundle, workingCopy } = context;
    const { repo, issueNumber } = run;

    workingCopy.ensureBranch(branch);
    const payload = await this.llm.generateStructured(
      PROMPTS.codeGeneration(
        requirements,
        bundle.repoStructure,
        JSON.stringify(
          {
            relevant_files: bundle.relevantFiles,
            plan: run.state.plan ?? null,
            feedback_history: run.state.feedbackHistory,
          },
          null,
          2,
        ),
      ),
      SYSTEM_PROMPTS.json,
    );
    const changeSet = decodeChangeSet(payload);
    applyChangeSet(workingCopy, changeSet);

    const sha = workingCopy.stageAndCommit(changeSet.files.map(file => file.path), changeSet.commitMessage);
    if (sha) {
      this.log(run, `Committed ${sha.substring(0, 7)}: ${changeSet.commitMessage}`);
    }
    await this.publish(run, branch, workingCopy, changeSet);

    const pull = await this.openOrUpdatePull(repo, issueNumber, branch, changeSet.commitMessage);
    this.checkpoint(run, { step: 'pr', prNumber: pull.number });

    const diff = await this.github.getPullRequestDiff(repo, pull.number);
    const review = await this.reviewer.reviewChanges(requirements, run.state.plan, diff, run.state.feedbackHistory);
    this.checkpoint(run, { step: 'final_review', feedbackHistory: [...run.state.feedbackHistory, review] });

    // lastFeedback only ever holds a review that reached the pull request.
    if (run.state.lastFeedback !== undefined && isDeepStrictEqual(run.state.lastFeedback, review)) {
      this.log(run, `Review feedback for PR #${pull.number} repeats the posted one; not posting it again`, 'warn');
    } else {
      await this.github.addComment(repo, pull.number, formatReviewComment(review));
      this.persist(run, { lastFeedback: review });
    }

    this.checkpoint(run, { step: 'completed' });
  }

  private async analyzeRequirements(run: WorkflowRun, issueContext: string): Promise<string> {
    try {
      const response = await this.llm.generate(PROMPTS.requirements(issueContext), SYSTEM_PROMPTS.requirements);
      const requirements = response.trim();
      if (requirements) {
        return requirements;
      }
      this.log(run, 'Requirements analysis returned nothing; using the issue text', 'warn');
    } catch (error) {
      this.log(run, `Requirements analysis failed (${describeError(error)}); using the issue text`, 'warn');
    }
    return issueContext;
  }

  /** Push through git; when that fails, write the same files through the contents API. */
  private async publish(run: WorkflowRun, branch: string, workingCopy: WorkingCopy, changeSet: ChangeSet): Promise<void> {
    try {
      workingCopy.push(branch);
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
      this.log(run, `Git push failed (${error.message}). Falling back to API commit.`, 'warn');
      await this.github.ensureBranch(run.repo, this.config.agent.baseBranch, branch);
      await this.github.applyFileChanges(run.repo, branch, changeSet.files, changeSet.commitMessage);
    }
  }

  private async openOrUpdatePull(
    repo: string,
    issueNumber: number,
    branch: string,
    commitMessage: string,
  ): Promise<PullRequestRef> {
    const title = `Resolve #${issueNumber}: ${commitMessage}`;
    const body = `Closes #${issueNumber}`;
    const existing = await this.github.findOpenPullByHead(repo, branch);
    if (existing) {
      return this.github.updatePullRequest(repo, existing.number, title, body);
    }
    return this.github.createPullRequest(repo, branch, this.config.agent.baseBranch, title, body);
  }

  private checkpoint(run: WorkflowRun, changes: Partial<WorkflowState>): void {
    const previousStep = run.state.step;
    this.persist(run, changes);
    if (changes.step && changes.step !== previousStep) {
      this.emitEvent({
        type: 'step_changed',
        timestamp: Date.now(),
        repo: run.repo,
        issueNumber: run.issueNumber,
        step: run.state.step,
        iteration: run.state.iteration,
        prNumber: run.state.prNumber,
      });
    }
  }

  private persist(run: WorkflowRun, changes: Partial<WorkflowState>): void {
    run.state = { ...run.state, ...changes, updatedAt: new Date().toISOString() };
    this.store.save(run.repo, run.issueNumber, run.state);
  }

  private finish(run: WorkflowRun, success: boolean): void {
    this.emitEvent({
      type: 'workflow_finished',
      timestamp: Date.now(),
      repo: run.repo,
      issueNumber: run.issueNumber,
      success,
      iteration: run.state.iteration,
      prNumber: run.state.prNumber,
    });
  }

  private emitEvent(event: WorkflowEvent): void {
    this.eventEmitter.emit('event', event);
  }

  private log(
    run: WorkflowRun,
    message: string,
    level: 'info' | 'warn' | 'error' | 'success' = 'info',
  ): void {
    if (!this.silent) {
      console.log(message);
    }
    getLogger()?.log(level === 'success' ? 'info' : level, 'IssueWorkflow', message);
    this.emitEvent({
      type: 'log',
      timestamp: Date.now(),
      repo: run.repo,
      issueNumber: run.issueNumber,
      level,
      message,
    });
  }
}
