import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { GitCommandError } from './errors.js';
import { getLogger } from './logger.js';

const IGNORED_DIRECTORIES = new Set(['.git', 'node_modules', '.venv', '__pycache__', '.pytest_cache', 'dist']);
const AUTOSTASH_MESSAGE = 'issue-loop-autostash';

export interface RepoTree {
  [name: string]: RepoTree | null;
}

/** A disposable local checkout the workflow mutates during one invocation. */
export interface WorkingCopy {
  readonly root: string;
  ensureBranch(branch: string): void;
  listFiles(): string[];
  getRepoStructure(): RepoTree;
  readFile(relativePath: string): string;
  writeFile(relativePath: string, content: string): void;
  deleteFile(relativePath: string): void;
  /** Returns the new commit sha, or null when nothing was staged. */
  stageAndCommit(paths: string[], message: string): string | null;
  push(branch: string): void;
  cleanup(): void;
}

export interface CloneRequest {
  repo: string;
  remoteUrl: string;
  baseBranch: string;
  token?: string;
  authorName: string;
  authorEmail: string;
}

export type WorkingCopyFactory = (request: CloneRequest) => WorkingCopy;

export function withCredentials(remoteUrl: string, token?: string): string {
  if (!token || !remoteUrl.startsWith('https://')) {
    return remoteUrl;
  }
  const base = remoteUrl.endsWith('.git') ? remoteUrl : `${remoteUrl}.git`;
  return base.replace('https://', `https://x-access-token:${encodeURIComponent(token)}@`);
}

export function resolveInside(root: string, relativePath: string): string {
  const target = path.resolve(root, relativePath);
  const relative = path.relative(root, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Path ${relativePath} escapes the working copy`);
  }
  return target;
}

/** Depth-first listing with entries sorted by name; paths use forward slashes. */
export function listRepoFiles(root: string): string[] {
  const files: string[] = [];
  const walk = (directory: string, prefix: string): void => {
    const entries = fs.readdirSync(directory, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          walk(path.join(directory, entry.name), `${prefix}${entry.name}/`);
        }
      } else if (entry.isFile()) {
        files.push(`${prefix}${entry.name}`);
      }
    }
  };
  walk(root, '');
  return files;
}

export function buildRepoTree(files: string[]): RepoTree {
  const tree: RepoTree = {};
  for (const file of files) {
    const parts = file.split('/');
    let current = tree;
    for (const part of parts.slice(0, -1)) {
      const existing = current[part];
      if (existing) {
        current = existing;
      } else {
        const child: RepoTree = {};
        current[part] = child;
        current = child;
      }
    }
    current[parts[parts.length - 1]] = null;
  }
  return tree;
}

/** Plain filesystem operations shared by every working copy. */
export abstract class FileSystemWorkingCopy implements WorkingCopy {
  constructor(public readonly root: string) {}

  abstract ensureBranch(branch: string): void;
  abstract stageAndCommit(paths: string[], message: string): string | null;
  abstract push(branch: string): void;

  listFiles(): string[] {
    return listRepoFiles(this.root);
  }

  getRepoStructure(): RepoTree {
    return buildRepoTree(this.listFiles());
  }

  readFile(relativePath: string): string {
    return fs.readFileSync(resolveInside(this.root, relativePath), 'utf-8');
  }

  writeFile(relativePath: string, content: string): void {
    const target = resolveInside(this.root, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }

  deleteFile(relativePath: string): void {
    const target = resolveInside(this.root, relativePath);
    if (fs.existsSync(target)) {
      fs.unlinkSync(target);
    }
  }

  cleanup(): void {
    if (fs.existsSync(this.root)) {
      fs.rmSync(this.root, { recursive: true, force: true });
    }
  }
}

export class GitWorkingCopy extends FileSystemWorkingCopy {
  private constructor(
    root: string,
    private readonly remoteUrl: string,
    private readonly token: string | undefined,
    private readonly author: { name: string; email: string },
  ) {
    super(root);
  }

  static clone(request: CloneRequest): GitWorkingCopy {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'issue-loop-'));
    getLogger()?.info('WorkingCopy', `Cloning ${request.repo} (${request.baseBranch}) into ${root}`);
    try {
      runGit(['clone', '--branch', request.baseBranch, withCredentials(request.remoteUrl, request.token), root], os.tmpdir());
      // The credential is only embedded for the duration of a single network call.
      runGit(['remote', 'set-url', 'origin', request.remoteUrl], root);
    } catch (error) {
      fs.rmSync(root, { recursive: true, force: true });
      throw error;
    }
    return new GitWorkingCopy(root, request.remoteUrl, request.token, {
      name: request.authorName,
      email: request.authorEmail,
    });
  }

  getCurrentBranch(): string {
    return this.git(['rev-parse', '--abbrev-ref', 'HEAD']).trim();
  }

  ensureBranch(branch: string): void {
    const stashCreated = this.stashIfNeeded();
    try {
      this.withAuthenticatedRemote(() => this.git(['fetch', 'origin']));
      if (this.refExists(`refs/heads/${branch}`)) {
        this.git(['checkout', branch]);
        return;
      }
      if (this.refExists(`refs/remotes/origin/${branch}`)) {
        this.git(['checkout', '-b', branch, '--track', `origin/${branch}`]);
        return;
      }
      this.git(['checkout', '-b', branch]);
    } finally {
      if (stashCreated) {
        this.restoreStash();
      }
    }
  }

  stageAndCommit(paths: string[], message: string): string | null {
    const stageable = paths.filter(file => this.isStageable(file));
    if (stageable.length > 0) {
      this.git(['add', '--all', '--', ...stageable]);
    }

    const staged = spawnSync('git', ['diff', '--cached', '--quiet'], { cwd: this.root });
    if (staged.status === 0) {
      getLogger()?.warn('WorkingCopy', 'No staged changes; skipping commit');
      return null;
    }

    this.git([...this.identity(), 'commit', '-m', message]);
    return this.git(['rev-parse', 'HEAD']).trim();
  }

  push(branch: string): void {
    this.withAuthenticatedRemote(() => this.git(['push', 'origin', `${branch}:${branch}`]));
  }

  /** Commit identity passed per command; the user's git config is never touched. */
  private identity(): string[] {
    return ['-c', `user.name=${this.author.name}`, '-c', `user.email=${this.author.email}`];
  }

  private withAuthenticatedRemote<T>(operation: () => T): T {
    if (!this.token) {
      return operation();
    }
    this.git(['remote', 'set-url', 'origin', withCredentials(this.remoteUrl, this.token)]);
    try {
      return operation();
    } finally {
      this.git(['remote', 'set-url', 'origin', this.remoteUrl]);
    }
  }

  private isStageable(file: string): boolean {
    if (fs.existsSync(resolveInside(this.root, file))) {
      return true;
    }
    return this.git(['ls-files', '--', file]).trim().length > 0;
  }

  private refExists(ref: string): boolean {
    return spawnSync('git', ['show-ref', '--verify', '--quiet', ref], { cwd: this.root }).status === 0;
  }

  private stashIfNeeded(): boolean {
    if (this.git(['status', '--porcelain', '--untracked-files=all']).trim() === '') {
      return false;
    }
    const before = this.stashCount();
    this.git([...this.identity(), 'stash', 'push', '--include-untracked', '-m', AUTOSTASH_MESSAGE]);
    const created = this.stashCount() > before;
    if (created) {
      getLogger()?.warn('WorkingCopy', 'Repository had local changes; stashed before branch switch.');
    }
    return created;
  }

  /** A conflicting pop keeps the stash entry; the tree is reset to the branch so no markers get committed. */
  private restoreStash(): void {
    try {
      this.git(['stash', 'pop']);
    } catch (error) {
      getLogger()?.warn(
        'WorkingCopy',
        `Failed to re-apply stashed changes (kept as ${AUTOSTASH_MESSAGE}): ${error instanceof Error ? error.message : String(error)}`
      );
      this.git(['reset', '--hard', '--quiet', 'HEAD']);
    }
  }

  private stashCount(): number {
    return this.git(['stash', 'list']).split('\n').filter(line => line.trim()).length;
  }

  private git(args: string[]): string {
    return runGit(args, this.root);
  }
}

export function runGit(args: string[], cwd: string): string {
  const result = spawnSync('git', args, {
    cwd,
    encoding: 'utf-8',
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
  });
  if (result.error) {
    throw new GitCommandError(args, result.error.message, null);
  }
  if (result.status !== 0) {
    throw new GitCommandError(args, result.stderr || result.stdout, result.status);
  }
  return result.stdout;
}

export const cloneWithGit: WorkingCopyFactory = request => GitWorkingCopy.clone(request);
