import { Octokit } from '@octokit/rest';

import { GitHubAppAuth, type GitHubAppCredentials } from './github-app-auth.js';
import { getLogger } from './logger.js';
import type {
  FileOperation,
  IssueComment,
  IssueDetails,
  PullRequestRef,
  ReviewDecision,
  WorkflowRunSummary,
} from './models.js';

/** Code-hosting operations the workflow depends on. */
export interface CodeHostClient {
  getIssue(repo: string, issueNumber: number): Promise<IssueDetails>;
  listIssueComments(repo: string, issueNumber: number): Promise<IssueComment[]>;
  canPush(repo: string): Promise<boolean>;
  findOpenPullByHead(repo: string, branch: string): Promise<PullRequestRef | null>;
  createPullRequest(repo: string, head: string, base: string, title: string, body: string): Promise<PullRequestRef>;
  updatePullRequest(repo: string, prNumber: number, title: string, body: string): Promise<PullRequestRef>;
  getPullRequest(repo: string, prNumber: number): Promise<PullRequestRef>;
  getPullRequestDiff(repo: string, prNumber: number): Promise<string>;
  addComment(repo: string, issueOrPrNumber: number, body: string): Promise<void>;
  ensureBranch(repo: string, baseBranch: string, branch: string): Promise<void>;
  applyFileChanges(repo: string, branch: string, files: FileOperation[], commitMessage: string): Promise<void>;
  listWorkflowRunsForPull(repo: string, prNumber: number): Promise<WorkflowRunSummary[]>;
  createReview(repo: string, prNumber: number, event: ReviewDecision, body: string): Promise<void>;
  /** Credential for git clone and push; undefined when the remote needs none. */
  accessToken(repo: string): Promise<string | undefined>;
}

/** A personal access token, or GitHub App credentials whose installation tokens are used per repository. */
export type GitHubAuthOptions =
  | { token: string; app?: undefined }
  | { app: GitHubAppCredentials; token?: undefined };

export type GitHubClientOptions = GitHubAuthOptions & {
  baseUrl?: string;
  /** Replaces the transport used by Octokit; tests route requests in process. */
  fetch?: (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
  sleep?: (ms: number) => Promise<void>;
};

type ClientAuth =
  | { kind: 'token'; token: string; octokit: Octokit }
  | { kind: 'app'; app: GitHubAppAuth; clients: Map<string, { token: string; octokit: Octokit }> };

const MAX_ATTEMPTS = 3;
const REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_RATE_LIMIT_WAIT_SECONDS = 5;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const errorStatus = (error: unknown): number | undefined =>
  isRecord(error) && typeof error.status === 'number' ? error.status : undefined;

const errorHeaders = (error: unknown): Record<string, unknown> => {
  if (isRecord(error) && isRecord(error.response) && isRecord(error.response.headers)) {
    return error.response.headers;
  }
  return {};
};

const headerNumber = (headers: Record<string, unknown>, name: string): number | undefined => {
  const value = headers[name];
  const text = typeof value === 'number' ? String(value) : value;
  if (typeof text !== 'string' || !/^\d+$/.test(text.trim())) {
    return undefined;
  }
  return Number(text.trim());
};

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const withTimeout = (fetchImpl: FetchLike): FetchLike =>
  (input, init) => fetchImpl(input, { ...init, signal: init?.signal ?? AbortSignal.timeout(REQUEST_TIMEOUT_MS) });

export function splitRepo(repo: string): { owner: string; repo: string } {
  const [owner, name, ...rest] = repo.split('/');
  if (!owner || !name || rest.length > 0) {
    throw new Error(`Invalid repository "${repo}": expected owner/name`);
  }
  return { owner, repo: name };
}

/**
 * Seconds to wait before retrying, or null when the error is not a rate-limit
 * response. A 403 only counts when GitHub signals an exhausted quota.
 */
export function rateLimitDelaySeconds(error: unknown, nowMs: number = Date.now()): number | null {
  const status = errorStatus(error);
  if (status !== 429 && status !== 403) {
    return null;
  }

  const headers = errorHeaders(error);
  const retryAfter = headerNumber(headers, 'retry-after');
  const remaining = headerNumber(headers, 'x-ratelimit-remaining');
  if (status === 403 && retryAfter === undefined && remaining !== 0) {
    return null;
  }

  if (retryAfter !== undefined) {
    return Math.max(1, retryAfter);
  }
  const reset = headerNumber(headers, 'x-ratelimit-reset');
  if (reset !== undefined) {
    return Math.max(1, reset - Math.floor(nowMs / 1000));
  }
  return DEFAULT_RATE_LIMIT_WAIT_SECONDS;
}

export class GitHubClient implements CodeHostClient {
  private auth: ClientAuth;
  private baseUrl?: string;
  private fetch: FetchLike;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: GitHubClientOptions) {
    this.baseUrl = options.baseUrl;
    this.fetch = withTimeout(options.fetch ?? ((input, init) => fetch(input, init)));
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.auth = options.app !== undefined
      ? { kind: 'app', app: new GitHubAppAuth(options.app, this.createOctokit()), clients: new Map() }
      : { kind: 'token', token: options.token, octokit: this.createOctokit(options.token) };
  }

  async accessToken(repo: string): Promise<string> {
    if (this.auth.kind === 'token') {
      return this.auth.token;
    }
    return this.auth.app.installationToken(splitRepo(repo));
  }

  /** Who the client acts as; GitHub App credentials are checked against a repository's installation. */
  async describeIdentity(repo?: string): Promise<string> {
    if (this.auth.kind === 'token') {
      const octokit = this.auth.octokit;
      const { data } = await this.call(() => octokit.rest.users.getAuthenticated());
      return `user ${data.login}`;
    }
    if (!repo) {
      return `GitHub App ${this.auth.app.appId} (pass a repository to check its installation)`;
    }
    const app = this.auth.app;
    const installationId = await this.call(() => app.installationId(splitRepo(repo)));
    return `GitHub App ${app.appId}, installation ${installationId} on ${repo}`;
  }

  async getIssue(repo: string, issueNumber: number): Promise<IssueDetails> {
    getLogger()?.info('GitHubClient', `Fetching issue ${issueNumber} from ${repo}`);
    const { data } = await this.api(repo, octokit =>
      octokit.rest.issues.get({ ...splitRepo(repo), issue_number: issueNumber })
    );
    return {
      number: data.number,
      title: data.title,
      body: data.body ?? '',
      state: data.state,
    };
  }

  async listIssueComments(repo: string, issueNumber: number): Promise<IssueComment[]> {
    const comments = await this.api(repo, octokit =>
      octokit.paginate(octokit.rest.issues.listComments, {
        ...splitRepo(repo),
        issue_number: issueNumber,
        per_page: 100,
      })
    );
    return comments.map(comment => ({
      id: comment.id,
      body: comment.body ?? '',
      author: comment.user?.login,
    }));
  }

  async canPush(repo: string): Promise<boolean> {
    if (this.auth.kind === 'app') {
      const app = this.auth.app;
      const permissions = await this.call(() => app.installationPermissions(splitRepo(repo)));
      return permissions.contents === 'write';
    }
    const { data } = await this.api(repo, octokit => octokit.rest.repos.get(splitRepo(repo)));
    const permissions = data.permissions;
    if (!permissions) {
      return false;
    }
    return Boolean(permissions.push || permissions.admin);
  }

  async findOpenPullByHead(repo: string, branch: string): Promise<PullRequestRef | null> {
    const target = splitRepo(repo);
    const { data } = await this.api(repo, octokit =>
      octokit.rest.pulls.list({ ...target, state: 'open', head: `${target.owner}:${branch}` })
    );
    const pull = data[0];
    if (!pull) {
      return null;
    }
    return { number: pull.number, url: pull.html_url, title: pull.title, body: pull.body ?? '', headRef: pull.head.ref };
  }

  async createPullRequest(repo: string, head: string, base: string, title: string, body: string): Promise<PullRequestRef> {
    const { data } = await this.api(repo, octokit =>
      octokit.rest.pulls.create({ ...splitRepo(repo), head, base, title, body })
    );
    getLogger()?.info('GitHubClient', `Created PR ${data.html_url}`);
    return { number: data.number, url: data.html_url, title: data.title, body: data.body ?? '', headRef: data.head.ref };
  }

  async updatePullRequest(repo: string, prNumber: number, title: string, body: string): Promise<PullRequestRef> {
    const { data } = await this.api(repo, octokit =>
      octokit.rest.pulls.update({ ...splitRepo(repo), pull_number: prNumber, title, body })
    );
    getLogger()?.info('GitHubClient', `Updated PR ${prNumber}`);
    return { number: data.number, url: data.html_url, title: data.title, body: data.body ?? '', headRef: data.head.ref };
  }

  async getPullRequest(repo: string, prNumber: number): Promise<PullRequestRef> {
    const { data } = await this.api(repo, octokit =>
      octokit.rest.pulls.get({ ...splitRepo(repo), pull_number: prNumber })
    );
    return { number: data.number, url: data.html_url, title: data.title, body: data.body ?? '', headRef: data.head.ref };
  }

  async getPullRequestDiff(repo: string, prNumber: number): Promise<string> {
    const response = await this.api(repo, octokit =>
      octokit.rest.pulls.get({
        ...splitRepo(repo),
        pull_number: prNumber,
        mediaType: { format: 'diff' },
      })
    );
    const diff: unknown = response.data;
    return typeof diff === 'string' ? diff : '';
  }

  async addComment(repo: string, issueOrPrNumber: number, body: string): Promise<void> {
    await this.api(repo, octokit =>
      octokit.rest.issues.createComment({ ...splitRepo(repo), issue_number: issueOrPrNumber, body })
    );
  }

  async ensureBranch(repo: string, baseBranch: string, branch: string): Promise<void> {
    const target = splitRepo(repo);
    try {
      await this.api(repo, octokit => octokit.rest.git.getRef({ ...target, ref: `heads/${branch}` }));
      return;
    } catch (error) {
      if (errorStatus(error) !== 404) {
        throw error;
      }
    }

    const { data: baseRef } = await this.api(repo, octokit =>
      octokit.rest.git.getRef({ ...target, ref: `heads/${baseBranch}` })
    );
    await this.api(repo, octokit =>
      octokit.rest.git.createRef({ ...target, ref: `refs/heads/${branch}`, sha: baseRef.object.sha })
    );
    getLogger()?.info('GitHubClient', `Created branch ${branch} from ${baseBranch}`);
  }

  async applyFileChanges(repo: string, branch: string, files: FileOperation[], commitMessage: string): Promise<void> {
    const target = splitRepo(repo);
    for (const file of files) {
      const existingSha = await this.getFileSha(repo, file.path, branch);

      if (file.action === 'delete') {
        if (existingSha) {
          await this.api(repo, octokit =>
            octokit.rest.repos.deleteFile({
              ...target,
              path: file.path,
              message: commitMessage,
              sha: existingSha,
              branch,
            })
          );
        }
        continue;
      }

      await this.api(repo, octokit =>
        octokit.rest.repos.createOrUpdateFileContents({
          ...target,
          path: file.path,
          message: commitMessage,
          content: Buffer.from(file.content, 'utf-8').toString('base64'),
          branch,
          ...(existingSha ? { sha: existingSha } : {}),
        })
      );
    }
    getLogger()?.info('GitHubClient', `Applied ${files.length} file change(s) to ${repo}@${branch} via the contents API`);
  }

  async listWorkflowRunsForPull(repo: string, prNumber: number): Promise<WorkflowRunSummary[]> {
    const { data } = await this.api(repo, octokit =>
      octokit.rest.actions.listWorkflowRunsForRepo({ ...splitRepo(repo), per_page: 100 })
    );
    return data.workflow_runs
      .filter(run => (run.pull_requests ?? []).some(pull => pull.number === prNumber))
      .map(run => ({
        id: run.id,
        name: run.name ?? `run ${run.id}`,
        status: run.status ?? 'unknown',
        conclusion: run.conclusion,
        url: run.html_url,
      }));
  }

  async createReview(repo: string, prNumber: number, event: ReviewDecision, body: string): Promise<void> {
    await this.api(repo, octokit =>
      octokit.rest.pulls.createReview({ ...splitRepo(repo), pull_number: prNumber, event, body })
    );
  }

  private async getFileSha(repo: string, path: string, branch: string): Promise<string | null> {
    try {
      const { data } = await this.api(repo, octokit =>
        octokit.rest.repos.getContent({ ...splitRepo(repo), path, ref: branch })
      );
      if (Array.isArray(data)) {
        throw new Error(`Path ${path} is a directory on ${branch}`);
      }
      return data.sha;
    } catch (error) {
      if (errorStatus(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  private createOctokit(token?: string): Octokit {
    return new Octokit({
      ...(token ? { auth: token } : {}),
      ...(this.baseUrl ? { baseUrl: this.baseUrl } : {}),
      request: { fetch: this.fetch },
    });
  }

  private async octokitFor(repo: string): Promise<Octokit> {
    if (this.auth.kind === 'token') {
      return this.auth.octokit;
    }
    const token = await this.auth.app.installationToken(splitRepo(repo));
    const cached = this.auth.clients.get(repo);
    if (cached && cached.token === token) {
      return cached.octokit;
    }
    const octokit = this.createOctokit(token);
    this.auth.clients.set(repo, { token, octokit });
    return octokit;
  }

  /** An API call against one repository, authenticated for it. */
  private api<T>(repo: string, operation: (octokit: Octokit) => Promise<T>): Promise<T> {
    return this.call(async () => operation(await this.octokitFor(repo)));
  }

  /** Runs one API call, waiting out rate-limit responses up to three attempts. */
  private async call<T>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const waitSeconds = rateLimitDelaySeconds(error);
        if (waitSeconds === null || attempt >= MAX_ATTEMPTS) {
          throw error;
        }
        getLogger()?.warn('GitHubClient', `Rate limited by GitHub. Sleeping for ${waitSeconds} seconds.`);
        await this.sleep(waitSeconds * 1000);
      }
    }
  }
}
