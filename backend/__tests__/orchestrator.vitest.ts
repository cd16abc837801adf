import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG, cloneConfig, type AgentConfig } from '../config.js';
import { ErrorLog, type ErrorRecord } from '../error-log.js';
import { StructuredOutputDecodeError } from '../errors.js';
import { WorkflowEventEmitter, type WorkflowEvent } from '../events.js';
import { FileStateStore } from '../file-state-store.js';
import type { ReviewFeedback, WorkflowState } from '../models.js';
import { IssueWorkflow } from '../orchestrator.js';
import { FakeGitHub, ScriptedLLM, TempWorkingCopyFactory, type ScriptedResponses } from './helpers/fakes.js';

const REPO = 'octo/demo';

const PLAN = {
  summary: 'Add main.txt',
  steps: ['Create main.txt with the greeting'],
  files_to_modify: [{ path: 'main.txt', reason: 'new file' }],
  files_to_avoid: [],
  acceptance_criteria: ['main.txt contains hello'],
};

const CODE = {
  files_to_modify: [{ path: 'main.txt', action: 'modify', content: 'hello' }],
  commit_message: 'Add greeting',
};

const DONE_REVIEW = { summary: 'Done', tasks: [] };

const greetingScript = (): ScriptedResponses => ({
  requirements: 'Create main.txt containing hello',
  plan: PLAN,
  code: CODE,
  review: DONE_REVIEW,
});

describe('IssueWorkflow', () => {
  let tempDir: string;
  let config: AgentConfig;
  let store: FileStateStore;
  let errorLog: ErrorLog;
  let github: FakeGitHub;
  let copies: TempWorkingCopyFactory;
  let events: WorkflowEvent[];

  const createWorkflow = (llm: ScriptedLLM): IssueWorkflow => {
    const eventEmitter = new WorkflowEventEmitter();
    eventEmitter.on('event', event => events.push(event));
    return new IssueWorkflow({
      github,
      llm,
      config,
      store,
      errorLog,
      workingCopyFactory: copies.create,
      eventEmitter,
      silent: true,
    });
  };

  const readErrors = (): ErrorRecord[] => {
    try {
      return readFileSync(errorLog.getFilePath(), 'utf-8')
        .trim()
        .split('\n')
        .map((line): ErrorRecord => JSON.parse(line));
    } catch {
      return [];
    }
  };

  const storedState = (): WorkflowState | undefined => store.load(REPO, 1);

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'issue-workflow-test-'));
    config = cloneConfig(DEFAULT_CONFIG);
    config.agent.stateDir = join(tempDir, 'state');
    config.agent.logDir = join(tempDir, 'logs');
    config.agent.maxIterations = 3;
    config.github.token = 'test-token';
    store = new FileStateStore(config.agent.stateDir);
    errorLog = new ErrorLog(config.agent.logDir);
    github = new FakeGitHub();
    copies = new TempWorkingCopyFactory();
    events = [];
  });

  afterEach(() => {
    for (const copy of copies.created) {
      copy.cleanup();
    }
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('single round', () => {
    it('resolves the greeting issue with one commit, one pull request and one comment', async () => {
      const llm = new ScriptedLLM(greetingScript());
      const workflow = createWorkflow(llm);

      const result = await workflow.processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(copies.created).toHaveLength(1);
      const copy = copies.created[0];
      expect(copy.request.baseBranch).toBe('main');
      expect(copy.request.remoteUrl).toBe('https://github.com/octo/demo');
      expect(copy.branches).toEqual(['agent/issue-1']);
      expect(copy.commits).toEqual([
        { branch: 'agent/issue-1', message: 'Add greeting', files: { 'main.txt': 'hello' } },
      ]);
      expect(copy.pushes).toEqual(['agent/issue-1']);
      expect(copy.request.token).toBe('test-token');
      expect(copy.cleaned).toBe(true);

      expect(github.pulls).toHaveLength(1);
      expect(github.pulls[0]).toMatchObject({
        number: 7,
        head: 'agent/issue-1',
        base: 'main',
        title: 'Resolve #1: Add greeting',
        body: 'Closes #1',
      });
      expect(github.postedComments).toEqual([{ number: 7, body: 'Done' }]);

      const state = storedState();
      expect(state?.step).toBe('completed');
      expect(state?.iteration).toBe(1);
      expect(state?.prNumber).toBe(7);
      expect(state?.feedbackHistory).toEqual([{ summary: 'Done', tasks: [] }]);
      expect(state?.plan?.summary).toBe('Add main.txt');
      expect(readErrors()).toEqual([]);
    });

    it('switches to the agent branch before applying the generated files', async () => {
      await createWorkflow(new ScriptedLLM(greetingScript())).processIssue(REPO, 1);

      expect(copies.created[0].operations).toEqual([
        'ensureBranch agent/issue-1',
        'write main.txt',
        'commit Add greeting',
        'push agent/issue-1',
      ]);
    });

    it('selects context files from the issue, not from the derived requirements', async () => {
      copies = new TempWorkingCopyFactory({ 'README.md': '# Demo\n', 'docs/guide.md': 'Guide\n' });
      const llm = new ScriptedLLM({ ...greetingScript(), requirements: 'Update docs/guide.md with the greeting' });

      await createWorkflow(llm).processIssue(REPO, 1);

      const relevant = JSON.stringify([{ path: 'README.md', content: '# Demo\n' }], null, 2);
      expect(llm.promptsFor('plan')[0]).toContain(`Relevant files:\n---\n${relevant}\n---`);
    });

    it('emits lifecycle events from start to finish', async () => {
      const workflow = createWorkflow(new ScriptedLLM(greetingScript()));

      await workflow.processIssue(REPO, 1);

      const steps = events.flatMap(event => (event.type === 'step_changed' ? [event.step] : []));
      expect(steps).toEqual(['analyze', 'plan', 'apply', 'pr', 'final_review', 'completed']);
      expect(events[0].type).toBe('workflow_started');
      const last = events[events.length - 1];
      expect(last.type === 'workflow_finished' && last.success).toBe(true);
    });

    it('updates an existing pull request instead of opening a second one', async () => {
      github.pulls.push({ number: 3, head: 'agent/issue-1', base: 'main', title: 'old', body: 'old', headRef: 'agent/issue-1' });
      const workflow = createWorkflow(new ScriptedLLM(greetingScript()));

      await workflow.processIssue(REPO, 1);

      expect(github.pulls).toHaveLength(1);
      expect(github.pulls[0].title).toBe('Resolve #1: Add greeting');
      expect(github.mutations).toEqual(['updatePullRequest #3', 'addComment #3']);
      expect(storedState()?.prNumber).toBe(3);
    });

    it('formats task bullets when the review has no final comment', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        review: {
          summary: 'Almost there',
          tasks: [{ message: 'Add a trailing newline', file: 'main.txt', line: 1 }, { message: 'Mention it in the README' }],
        },
      });

      await createWorkflow(llm).processIssue(REPO, 1);

      expect(github.postedComments[0].body).toBe(
        'Almost there\n- Add a trailing newline (main.txt:1)\n- Mention it in the README'
      );
    });

    it('falls back to the issue text when requirements analysis fails', async () => {
      const llm = new ScriptedLLM({ ...greetingScript(), requirements: new Error('model unavailable') });

      const result = await createWorkflow(llm).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(llm.promptsFor('plan')[0]).toContain('Requirements:\n---\nCreate main.txt containing hello\n---');
    });

    it('commits through the contents API when git push fails', async () => {
      copies.failPush = true;

      const result = await createWorkflow(new ScriptedLLM(greetingScript())).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(github.ensuredBranches).toEqual([{ base: 'main', branch: 'agent/issue-1' }]);
      expect(github.appliedChanges).toEqual([
        {
          branch: 'agent/issue-1',
          files: [{ action: 'modify', path: 'main.txt', content: 'hello' }],
          message: 'Add greeting',
        },
      ]);
    });
  });

  describe('idempotence', () => {
    it('does nothing when the stored workflow is already completed', async () => {
      const llm = new ScriptedLLM(greetingScript());
      const workflow = createWorkflow(llm);
      await workflow.processIssue(REPO, 1);
      const callsAfterFirstRun = llm.calls.length;
      const mutationsAfterFirstRun = [...github.mutations];

      const result = await workflow.processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(llm.calls).toHaveLength(callsAfterFirstRun);
      expect(github.mutations).toEqual(mutationsAfterFirstRun);
      expect(copies.created).toHaveLength(1);
      expect(storedState()?.step).toBe('completed');
    });
  });

  describe('restart gate', () => {
    it('resets the workflow when a new comment changes the requirements', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        triage: { restart: true, summary: 'Use goodbye instead', reason: 'requirements changed' },
      });
      const workflow = createWorkflow(llm);
      await workflow.processIssue(REPO, 1);
      const mutationsAfterFirstRun = [...github.mutations];

      github.comments = [{ id: 101, body: 'Actually, write goodbye instead.' }];
      const result = await workflow.processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(llm.count('triage')).toBe(1);
      expect(github.mutations).toEqual(mutationsAfterFirstRun);
      expect(copies.created).toHaveLength(1);

      const state = storedState();
      expect(state?.step).toBe('restart');
      expect(state?.iteration).toBe(0);
      expect(state?.plan).toBeUndefined();
      expect(state?.feedbackHistory).toEqual([]);
      expect(state?.lastIssueCommentId).toBe(101);
      expect(state?.commentDecision).toEqual({
        restart: true,
        summary: 'Use goodbye instead',
        reason: 'requirements changed',
      });
      expect(events.some(event => event.type === 'restart' && event.commentId === 101)).toBe(true);
    });

    it('runs again from scratch after a restart without re-triaging the same comment', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        triage: { restart: true, summary: 'Use goodbye instead', reason: 'requirements changed' },
      });
      const workflow = createWorkflow(llm);
      await workflow.processIssue(REPO, 1);
      github.comments = [{ id: 101, body: 'Actually, write goodbye instead.' }];
      await workflow.processIssue(REPO, 1);

      const result = await workflow.processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(llm.count('triage')).toBe(1);
      expect(llm.count('plan')).toBe(2);
      expect(llm.promptsFor('requirements')[1]).toContain('COMMENT:\nActually, write goodbye instead.');
      const state = storedState();
      expect(state?.step).toBe('completed');
      expect(state?.iteration).toBe(1);
      expect(state?.feedbackHistory).toHaveLength(1);
    });

    it('records the decision and stays completed when the comment needs no restart', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        triage: { restart: false, summary: 'Thanks', reason: 'no new requirements' },
      });
      const workflow = createWorkflow(llm);
      await workflow.processIssue(REPO, 1);
      const mutationsAfterFirstRun = [...github.mutations];
      github.comments = [{ id: 102, body: 'Thanks, looks good!' }];

      expect(await workflow.processIssue(REPO, 1)).toBe(true);
      expect(await workflow.processIssue(REPO, 1)).toBe(true);

      expect(llm.count('triage')).toBe(1);
      expect(github.mutations).toEqual(mutationsAfterFirstRun);
      const state = storedState();
      expect(state?.step).toBe('completed');
      expect(state?.iteration).toBe(1);
      expect(state?.lastIssueCommentId).toBe(102);
      expect(state?.commentDecision?.restart).toBe(false);
    });

    it('does not consult the model when the issue has no comments', async () => {
      const llm = new ScriptedLLM(greetingScript());

      await createWorkflow(llm).processIssue(REPO, 1);

      expect(llm.count('triage')).toBe(0);
    });
  });

  describe('preconditions', () => {
    it('fails without touching GitHub or cloning when the token cannot push', async () => {
      github.pushAllowed = false;
      const llm = new ScriptedLLM(greetingScript());

      const result = await createWorkflow(llm).processIssue(REPO, 1);

      expect(result).toBe(false);
      expect(copies.created).toHaveLength(0);
      expect(github.mutations).toEqual([]);
      expect(llm.count('requirements')).toBe(0);
      expect(storedState()).toBeUndefined();
      const errors = readErrors();
      expect(errors).toHaveLength(1);
      expect(errors[0].errorType).toBe('PermissionError');
      expect(errors[0].repo).toBe(REPO);
      expect(errors[0].issueNumber).toBe(1);
    });

    it('converts an unexpected failure into false and records it', async () => {
      github.failGetIssue = new Error('Bad credentials');

      const result = await createWorkflow(new ScriptedLLM(greetingScript())).processIssue(REPO, 1);

      expect(result).toBe(false);
      const errors = readErrors();
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({
        repo: REPO,
        issueNumber: 1,
        iteration: 0,
        step: 'requirements',
        errorType: 'Error',
        message: 'Bad credentials',
      });
    });
  });

  describe('iteration bound', () => {
    it('stops after the configured number of failing rounds', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        code: new StructuredOutputDecodeError('Invalid JSON after repair', 'not json'),
      });

      const result = await createWorkflow(llm).processIssue(REPO, 1);

      expect(result).toBe(false);
      expect(llm.count('code')).toBe(3);
      expect(storedState()?.iteration).toBe(3);
      expect(github.pulls).toEqual([]);
      expect(copies.created[0].cleaned).toBe(true);
      const errors = readErrors();
      expect(errors.map(error => [error.iteration, error.step, error.errorType])).toEqual([
        [1, 'apply', 'StructuredOutputDecodeError'],
        [2, 'apply', 'StructuredOutputDecodeError'],
        [3, 'apply', 'StructuredOutputDecodeError'],
      ]);
    });

    it('refuses to start another round once the budget is spent', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        code: new StructuredOutputDecodeError('Invalid JSON after repair', 'not json'),
      });
      const workflow = createWorkflow(llm);
      await workflow.processIssue(REPO, 1);

      const result = await workflow.processIssue(REPO, 1);

      expect(result).toBe(false);
      expect(copies.created).toHaveLength(1);
      expect(llm.count('code')).toBe(3);
      expect(readErrors()[3].errorType).toBe('IterationLimitError');
    });

    it('continues with the next round after a failed one', async () => {
      const llm = new ScriptedLLM({
        ...greetingScript(),
        code: [new Error('upstream timeout'), CODE],
      });

      const result = await createWorkflow(llm).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(storedState()?.iteration).toBe(2);
      expect(storedState()?.feedbackHistory).toHaveLength(1);
      expect(readErrors().map(error => [error.iteration, error.message])).toEqual([[1, 'upstream timeout']]);
    });

    it('posts the review in the next round when posting it failed', async () => {
      github.failComments = [new Error('502 Bad Gateway')];

      const result = await createWorkflow(new ScriptedLLM(greetingScript())).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(github.postedComments).toEqual([{ number: 7, body: 'Done' }]);
      expect(readErrors().map(error => [error.iteration, error.step, error.message])).toEqual([
        [1, 'final_review', '502 Bad Gateway'],
      ]);
      const state = storedState();
      expect(state?.iteration).toBe(2);
      expect(state?.feedbackHistory).toEqual([DONE_REVIEW, DONE_REVIEW]);
      expect(state?.lastFeedback).toEqual(DONE_REVIEW);
    });
  });

  describe('resume', () => {
    const feedback: ReviewFeedback = { summary: 'Done', tasks: [] };

    const seedFinalReview = (lastFeedback?: ReviewFeedback): void => {
      store.save(REPO, 1, {
        iteration: 1,
        step: 'final_review',
        prNumber: 7,
        plan: {
          summary: 'Add main.txt',
          steps: ['Create main.txt'],
          filesToModify: [{ path: 'main.txt' }],
          filesToAvoid: [],
          acceptanceCriteria: [],
        },
        feedbackHistory: [feedback],
        ...(lastFeedback ? { lastFeedback } : {}),
        updatedAt: '2026-01-01T00:00:00.000Z',
      });
      github.pulls.push({ number: 7, head: 'agent/issue-1', base: 'main', title: 't', body: 'b', headRef: 'agent/issue-1' });
    };

    it('reuses the stored plan and posts a review that was interrupted before posting', async () => {
      seedFinalReview();
      const llm = new ScriptedLLM(greetingScript());

      const result = await createWorkflow(llm).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(llm.count('plan')).toBe(0);
      expect(github.mutations).toEqual(['updatePullRequest #7', 'addComment #7']);
      expect(github.postedComments).toEqual([{ number: 7, body: 'Done' }]);
      const state = storedState();
      expect(state?.iteration).toBe(2);
      expect(state?.feedbackHistory).toEqual([feedback, feedback]);
      expect(state?.lastFeedback).toEqual(feedback);
      expect(state?.step).toBe('completed');
    });

    it('does not post the same review twice once it reached the pull request', async () => {
      seedFinalReview(feedback);

      const result = await createWorkflow(new ScriptedLLM(greetingScript())).processIssue(REPO, 1);

      expect(result).toBe(true);
      expect(github.postedComments).toEqual([]);
      const state = storedState();
      expect(state?.feedbackHistory).toEqual([feedback, feedback]);
      expect(state?.step).toBe('completed');
    });
  });
});
