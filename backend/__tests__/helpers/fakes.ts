import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { GitCommandError } from '../../errors.js';
import type { CodeHostClient } from '../../github-client.js';
import type { LLMClient } from '../../llm-client.js';
import type {
  FileOperation,
  IssueComment,
  IssueDetails,
  PullRequestRef,
  ReviewDecision,
  WorkflowRunSummary,
} from '../../models.js';
import type { JsonObject } from '../../structured-output.js';
import { FileSystemWorkingCopy, type CloneRequest } from '../../working-copy.js';

export interface FakePull extends PullRequestRef {
  head: string;
  base: string;
  title: string;
  body: string;
}

/** In-memory GitHub. Every write is appended to `mutations`. */
export class FakeGitHub implements CodeHostClient {
  issue: IssueDetails = { number: 1, title: 'Add a greeting', body: 'Create main.txt containing hello', state: 'open' };
  comments: IssueComment[] = [];
  pushAllowed = true;
  diff = 'diff --git a/main.txt b/main.txt\n+hello\n';
  workflowRuns: WorkflowRunSummary[] = [];
  pulls: FakePull[] = [];
  postedComments: Array<{ number: number; body: string }> = [];
  reviews: Array<{ number: number; event: ReviewDecision; body: string }> = [];
  appliedChanges: Array<{ branch: string; files: FileOperation[]; message: string }> = [];
  ensuredBranches: Array<{ base: string; branch: string }> = [];
  mutations: string[] = [];
  failGetIssue?: Error;
  /** Errors thrown by the next addComment calls, one per call. */
  failComments: Error[] = [];
  token = 'test-token';
  private nextPullNumber = 7;

  async getIssue(_repo: string, issueNumber: number): Promise<IssueDetails> {
    if (this.failGetIssue) {
      throw this.failGetIssue;
    }
    return { ...this.issue, number: issueNumber };
  }

  async listIssueComments(): Promise<IssueComment[]> {
    return [...this.comments];
  }

  async canPush(): Promise<boolean> {
    return this.pushAllowed;
  }

  async findOpenPullByHead(_repo: string, branch: string): Promise<PullRequestRef | null> {
    return this.pulls.find(pull => pull.head === branch) ?? null;
  }

  async createPullRequest(_repo: string, head: string, base: string, title: string, body: string): Promise<PullRequestRef> {
    const pull: FakePull = { number: this.nextPullNumber++, head, base, title, body, headRef: head };
    this.pulls.push(pull);
    this.mutations.push(`createPullRequest #${pull.number}`);
    return pull;
  }

  async updatePullRequest(_repo: string, prNumber: number, title: string, body: string): Promise<PullRequestRef> {
    const pull = this.pulls.find(candidate => candidate.number === prNumber);
    if (!pull) {
      throw new Error(`No pull request #${prNumber}`);
    }
    pull.title = title;
    pull.body = body;
    this.mutations.push(`updatePullRequest #${prNumber}`);
    return pull;
  }

  async getPullRequest(_repo: string, prNumber: number): Promise<PullRequestRef> {
    const pull = this.pulls.find(candidate => candidate.number === prNumber);
    if (!pull) {
      throw new Error(`No pull request #${prNumber}`);
    }
    return pull;
  }

  async getPullRequestDiff(): Promise<string> {
    return this.diff;
  }

  async addComment(_repo: string, issueOrPrNumber: number, body: string): Promise<void> {
    const failure = this.failComments.shift();
    if (failure) {
      throw failure;
    }
    this.postedComments.push({ number: issueOrPrNumber, body });
    this.mutations.push(`addComment #${issueOrPrNumber}`);
  }

  async ensureBranch(_repo: string, baseBranch: string, branch: string): Promise<void> {
    this.ensuredBranches.push({ base: baseBranch, branch });
    this.mutations.push(`ensureBranch ${branch}`);
  }

  async applyFileChanges(_repo: string, branch: string, files: FileOperation[], commitMessage: string): Promise<void> {
    this.appliedChanges.push({ branch, files, message: commitMessage });
    this.mutations.push(`applyFileChanges ${branch}`);
  }

  async listWorkflowRunsForPull(): Promise<WorkflowRunSummary[]> {
    return this.workflowRuns;
  }

  async createReview(_repo: string, prNumber: number, event: ReviewDecision, body: string): Promise<void> {
    this.reviews.push({ number: prNumber, event, body });
    this.mutations.push(`createReview #${prNumber}`);
  }

  async accessToken(): Promise<string> {
    return this.token;
  }
}

export type PromptKind = 'requirements' | 'plan' | 'code' | 'review' | 'triage' | 'prReview' | 'other';

/** A fixed answer, a thrown error, or successive answers per call (the last one repeats). */
type Scripted<T> = T | Error | Array<T | Error>;

export interface ScriptedResponses {
  requirements?: Scripted<string>;
  plan?: Scripted<JsonObject>;
  code?: Scripted<JsonObject>;
  review?: Scripted<JsonObject>;
  triage?: Scripted<JsonObject>;
  prReview?: Scripted<JsonObject>;
}

const PROMPT_TITLES: Array<[string, PromptKind]> = [
  ['# Requirements analysis', 'requirements'],
  ['# Implementation plan', 'plan'],
  ['# Code generation', 'code'],
  ['# Change review', 'review'],
  ['# Issue comment triage', 'triage'],
  ['# Pull request review', 'prReview'],
];

export const classifyPrompt = (prompt: string): PromptKind =>
  PROMPT_TITLES.find(([title]) => prompt.startsWith(title))?.[1] ?? 'other';

const pick = <T>(value: Scripted<T> | undefined, kind: PromptKind, callIndex: number): T | Error => {
  if (value === undefined) {
    return new Error(`No scripted response for ${kind}`);
  }
  if (Array.isArray(value)) {
    return value[Math.min(callIndex, value.length - 1)];
  }
  return value;
};

/** Answers each prompt according to its title; records every call. */
export class ScriptedLLM implements LLMClient {
  calls: Array<{ kind: PromptKind; prompt: string }> = [];

  constructor(public responses: ScriptedResponses) {}

  count(kind: PromptKind): number {
    return this.calls.filter(call => call.kind === kind).length;
  }

  promptsFor(kind: PromptKind): string[] {
    return this.calls.filter(call => call.kind === kind).map(call => call.prompt);
  }

  async generate(prompt: string): Promise<string> {
    const kind = this.record(prompt);
    if (kind !== 'requirements') {
      throw new Error(`Unexpected free-text prompt ${kind}`);
    }
    const answer = pick(this.responses.requirements, kind, this.count(kind) - 1);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }

  async generateStructured(prompt: string): Promise<JsonObject> {
    const kind = this.record(prompt);
    const index = this.count(kind) - 1;
    const answer = kind === 'requirements' || kind === 'other'
      ? new Error(`Unexpected structured prompt ${kind}`)
      : pick(this.responses[kind], kind, index);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }

  private record(prompt: string): PromptKind {
    const kind = classifyPrompt(prompt);
    this.calls.push({ kind, prompt });
    return kind;
  }
}

export interface RecordedCommit {
  branch: string;
  message: string;
  files: Record<string, string | null>;
}

/** Real files in a temp directory; branch, commit and push are recorded instead of run. */
export class TempWorkingCopy extends FileSystemWorkingCopy {
  /** Every branch switch, write, delete, commit and push, in call order. */
  operations: string[] = [];
  branches: string[] = [];
  commits: RecordedCommit[] = [];
  pushes: string[] = [];
  cleaned = false;
  failPush = false;
  private currentBranch: string;

  constructor(public readonly request: CloneRequest, files: Record<string, string>) {
    super(mkdtempSync(join(tmpdir(), 'issue-loop-wc-')));
    this.currentBranch = request.baseBranch;
    for (const [file, content] of Object.entries(files)) {
      super.writeFile(file, content);
    }
  }

  writeFile(relativePath: string, content: string): void {
    this.operations.push(`write ${relativePath}`);
    super.writeFile(relativePath, content);
  }

  deleteFile(relativePath: string): void {
    this.operations.push(`delete ${relativePath}`);
    super.deleteFile(relativePath);
  }

  ensureBranch(branch: string): void {
    this.operations.push(`ensureBranch ${branch}`);
    this.branches.push(branch);
    this.currentBranch = branch;
  }

  stageAndCommit(paths: string[], message: string): string | null {
    if (paths.length === 0) {
      return null;
    }
    const files: Record<string, string | null> = {};
    for (const file of paths) {
      try {
        files[file] = this.readFile(file);
      } catch {
        files[file] = null;
      }
    }
    this.operations.push(`commit ${message}`);
    this.commits.push({ branch: this.currentBranch, message, files });
    return `${this.commits.length}`.padStart(40, '0');
  }

  push(branch: string): void {
    if (this.failPush) {
      throw new GitCommandError(['push', 'origin', branch], 'remote: Permission denied', 128);
    }
    this.operations.push(`push ${branch}`);
    this.pushes.push(branch);
  }

  cleanup(): void {
    this.cleaned = true;
    super.cleanup();
  }
}

export class TempWorkingCopyFactory {
  created: TempWorkingCopy[] = [];
  failPush = false;

  constructor(private readonly files: Record<string, string> = { 'README.md': '# Demo\n' }) {}

  create = (request: CloneRequest): TempWorkingCopy => {
    const copy = new TempWorkingCopy(request, this.files);
    copy.failPush = this.failPush;
    this.created.push(copy);
    return copy;
  };
}
