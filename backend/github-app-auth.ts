import { createAppAuth } from '@octokit/auth-app';
import type { Octokit } from '@octokit/rest';

import { getLogger } from './logger.js';

export interface GitHubAppCredentials {
  appId: string;
  privateKey: string;
  /** Fixed installation; when absent it is looked up per repository. */
  installationId?: number;
}

export interface RepoTarget {
  owner: string;
  repo: string;
}

/**
 * Installation tokens for a GitHub App. The installation of each repository is
 * resolved once with an app JWT; tokens are cached and renewed by the auth
 * strategy before they expire.
 */
export class GitHubAppAuth {
  private auth: ReturnType<typeof createAppAuth>;
  private installations = new Map<string, number>();

  constructor(
    private readonly credentials: GitHubAppCredentials,
    private readonly octokit: Octokit,
  ) {
    this.auth = createAppAuth({
      appId: credentials.appId,
      privateKey: credentials.privateKey,
      request: octokit.request,
    });
  }

  get appId(): string {
    return this.credentials.appId;
  }

  async installationId(target: RepoTarget): Promise<number> {
    if (this.credentials.installationId !== undefined) {
      return this.credentials.installationId;
    }

    const key = `${target.owner}/${target.repo}`;
    const cached = this.installations.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const { token } = await this.auth({ type: 'app' });
    const { data } = await this.octokit.rest.apps.getRepoInstallation({
      ...target,
      headers: { authorization: `bearer ${token}` },
    });
    this.installations.set(key, data.id);
    getLogger()?.info('GitHubAppAuth', `Resolved installation ${data.id} for ${key}`);
    return data.id;
  }

  async installationToken(target: RepoTarget): Promise<string> {
    const { token } = await this.installation(target);
    return token;
  }

  /** Permissions granted to the installation token, e.g. `{ contents: 'write' }`. */
  async installationPermissions(target: RepoTarget): Promise<Record<string, string>> {
    const { permissions } = await this.installation(target);
    return { ...permissions };
  }

  private async installation(target: RepoTarget) {
    const installationId = await this.installationId(target);
    return this.auth({ type: 'installation', installationId });
  }
}
