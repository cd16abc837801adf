import { createHmac, timingSafeEqual } from 'crypto';
import express, { type Express } from 'express';
import { createServer, type Server as HTTPServer } from 'http';
import type { AddressInfo } from 'net';

import { getLogger } from './logger.js';
import { KeyedTaskQueue } from './task-queue.js';

export interface WebhookTarget {
  repo: string;
  issueNumber: number;
}

export interface WebhookRouting {
  triggerLabel: string;
  branchPrefix: string;
}

export type IssueDispatcher = (repo: string, issueNumber: number) => Promise<boolean>;

export interface WebhookServerConfig {
  port?: number;
  secret?: string;
  routing: WebhookRouting;
  dispatch: IssueDispatcher;
  queue?: KeyedTaskQueue;
  silent?: boolean;
}

const ISSUE_ACTIONS = new Set(['opened', 'edited', 'labeled', 'reopened']);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function signPayload(secret: string, body: Buffer | string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export function verifySignature(secret: string, body: Buffer, signature: string | undefined): boolean {
  if (!signature || !signature.startsWith('sha256=')) {
    return false;
  }
  const expected = Buffer.from(signPayload(secret, body));
  const received = Buffer.from(signature);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

/** Issue number encoded in an agent branch name, or null for any other branch. */
export function issueNumberFromBranch(branch: unknown, branchPrefix: string): number | null {
  if (typeof branch !== 'string' || !branch.startsWith(branchPrefix)) {
    return null;
  }
  const suffix = branch.substring(branchPrefix.length);
  return /^\d+$/.test(suffix) ? Number(suffix) : null;
}

/** Maps a GitHub webhook delivery to the issues whose workflow it should (re)run. */
export function resolveWebhookTargets(event: string, payload: unknown, routing: WebhookRouting): WebhookTarget[] {
  if (!isRecord(payload) || !isRecord(payload.repository) || typeof payload.repository.full_name !== 'string') {
    return [];
  }
  const repo = payload.repository.full_name;
  const action = payload.action;

  if (event === 'issues') {
    if (typeof action !== 'string' || !ISSUE_ACTIONS.has(action) || !isRecord(payload.issue)) {
      return [];
    }
    const issue = payload.issue;
    const labels = Array.isArray(issue.labels) ? issue.labels : [];
    const labelled = labels.some(label => isRecord(label) && label.name === routing.triggerLabel);
    return labelled && typeof issue.number === 'number' ? [{ repo, issueNumber: issue.number }] : [];
  }

  if (event === 'pull_request') {
    if (action !== 'synchronize' || !isRecord(payload.pull_request) || !isRecord(payload.pull_request.head)) {
      return [];
    }
    const issueNumber = issueNumberFromBranch(payload.pull_request.head.ref, routing.branchPrefix);
    return issueNumber === null ? [] : [{ repo, issueNumber }];
  }

  if (event === 'workflow_run') {
    if (action !== 'completed' || !isRecord(payload.workflow_run)) {
      return [];
    }
    const run = payload.workflow_run;
    const branches: unknown[] = [run.head_branch];
    if (Array.isArray(run.pull_requests)) {
      for (const pull of run.pull_requests) {
        if (isRecord(pull) && isRecord(pull.head)) {
          branches.push(pull.head.ref);
        }
      }
    }
    const targets: WebhookTarget[] = [];
    for (const branch of branches) {
      const issueNumber = issueNumberFromBranch(branch, routing.branchPrefix);
      if (issueNumber !== null && !targets.some(target => target.issueNumber === issueNumber)) {
        targets.push({ repo, issueNumber });
      }
    }
    return targets;
  }

  return [];
}

export class WebhookServer {
  private app: Express;
  private httpServer: HTTPServer;
  private port: number;
  private secret?: string;
  private routing: WebhookRouting;
  private dispatch: IssueDispatcher;
  private queue: KeyedTaskQueue;
  private silent: boolean;

  constructor(config: WebhookServerConfig) {
    this.port = config.port ?? 8000;
    this.secret = config.secret;
    this.routing = config.routing;
    this.dispatch = config.dispatch;
    this.queue = config.queue ?? new KeyedTaskQueue();
    this.silent = config.silent ?? false;

    this.app = express();
    this.httpServer = createServer(this.app);
    this.setupRoutes();
  }

  getQueue(): KeyedTaskQueue {
    return this.queue;
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      res.json({ status: 'ok' });
    });

    this.app.post('/webhook/github', express.raw({ type: '*/*', limit: '5mb' }), (req, res) => {
      const body: unknown = req.body;
      const raw = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

      if (this.secret) {
        if (!verifySignature(this.secret, raw, req.get('X-Hub-Signature-256'))) {
          getLogger()?.warn('WebhookServer', 'Rejected delivery with an invalid signature');
          res.status(403).json({ detail: 'Invalid signature' });
          return;
        }
      } else {
        getLogger()?.warn('WebhookServer', 'GITHUB_WEBHOOK_SECRET is not set. Skipping signature verification.');
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw.toString('utf-8'));
      } catch {
        res.status(400).json({ detail: 'Body is not valid JSON' });
        return;
      }

      const event = req.get('X-GitHub-Event') ?? '';
      const targets = resolveWebhookTargets(event, payload, this.routing);
      for (const target of targets) {
        this.enqueue(target);
      }
      res.json({ status: 'accepted', event, queued: targets.map(target => `${target.repo}#${target.issueNumber}`) });
    });
  }

  private enqueue(target: WebhookTarget): void {
    const key = `${target.repo}#${target.issueNumber}`;
    getLogger()?.info('WebhookServer', `Queued ${key}`);
    this.queue
      .enqueue(key, () => this.dispatch(target.repo, target.issueNumber))
      .then(success => {
        getLogger()?.info('WebhookServer', `Finished ${key}: ${success ? 'success' : 'failure'}`);
      })
      .catch((error: unknown) => {
        getLogger()?.error(
          'WebhookServer',
          `Processing ${key} failed: ${error instanceof Error ? error.message : String(error)}`
        );
      });
  }

  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.port, () => {
        const url = `http://localhost:${this.address().port}`;
        if (!this.silent) {
          console.log(`Webhook server listening at ${url}/webhook/github`);
        }
        resolve(url);
      });
    });
  }

  address(): AddressInfo {
    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      return { address: '', family: '', port: this.port };
    }
    return address;
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.close(error => (error ? reject(error) : resolve()));
    });
  }
}
