import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';

import { ConfigError } from './errors.js';
import type { GitHubAppCredentials } from './github-app-auth.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export type StateBackend = 'file' | 'sqlite';
export type GitHubAuthMode = 'pat' | 'app';
export type LLMProvider = 'openai';

export interface GitHubSettings {
  authMode: GitHubAuthMode;
  token?: string;
  appId?: string;
  privateKeyPath?: string;
  /** Looked up per repository when unset. */
  installationId?: number;
  webhookSecret?: string;
  /** REST API root, e.g. for GitHub Enterprise. */
  apiUrl?: string;
  /** Prefix clone URLs are built from: `<cloneBaseUrl>/<owner>/<repo>.git`. */
  cloneBaseUrl: string;
}

export interface LLMSettings {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl: string;
  referer?: string;
  title?: string;
}

export interface AgentSettings {
  maxIterations: number;
  baseBranch: string;
  branchPrefix: string;
  triggerLabel: string;
  stateDir: string;
  stateBackend: StateBackend;
  logDir: string;
  logLevel: LogLevel;
}

export interface GitSettings {
  authorName: string;
  authorEmail: string;
}

export interface ServerSettings {
  port: number;
}

export interface AgentConfig {
  github: GitHubSettings;
  llm: LLMSettings;
  agent: AgentSettings;
  git: GitSettings;
  server: ServerSettings;
}

export const DEFAULT_CONFIG_FILE = 'issue-loop.yml';

export const DEFAULT_CONFIG: AgentConfig = {
  github: {
    authMode: 'pat',
    cloneBaseUrl: 'https://github.com',
  },
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
  },
  agent: {
    maxIterations: 5,
    baseBranch: 'main',
    branchPrefix: 'agent/issue-',
    triggerLabel: 'ai-agent',
    stateDir: '.issue-loop/state',
    stateBackend: 'file',
    logDir: '.issue-loop/logs',
    logLevel: 'info',
  },
  git: {
    authorName: 'issue-loop',
    authorEmail: 'issue-loop@users.noreply.github.com',
  },
  server: {
    port: 8000,
  },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readSection = (source: Record<string, unknown>, key: string): Record<string, unknown> => {
  const section = source[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError(`${key} must be a mapping.`);
  }
  return section;
};

const optionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${path} must be a string.`);
  }
  return value;
};

const positiveInteger = (value: unknown, path: string): number | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${path} must be a positive integer, got: ${String(value)}`);
  }
  return parsed;
};

/** Accepts a YAML number or a string. */
const optionalId = (value: unknown, path: string): string | undefined =>
  typeof value === 'number' ? String(positiveInteger(value, path)) : optionalString(value, path);

const oneOf = <T extends string>(
  value: unknown,
  allowed: readonly T[],
  path: string,
): T | undefined => {
  const text = optionalString(value, path);
  if (text === undefined) {
    return undefined;
  }
  const normalized = text.toLowerCase();
  const match = allowed.find(candidate => candidate === normalized);
  if (!match) {
    throw new ConfigError(`${path} must be one of ${allowed.join(', ')}, got: ${text}`);
  }
  return match;
};

/** Parse the YAML configuration file format into a partial override. */
export function parseConfigFile(text: string, origin: string = DEFAULT_CONFIG_FILE): AgentConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${origin}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (document === null || document === undefined) {
    return cloneConfig(DEFAULT_CONFIG);
  }
  if (!isRecord(document)) {
    throw new ConfigError(`${origin} must contain a mapping at the top level.`);
  }

  const github = readSection(document, 'github');
  const llm = readSection(document, 'llm');
  const agent = readSection(document, 'agent');
  const git = readSection(document, 'git');
  const server = readSection(document, 'server');
  const base = DEFAULT_CONFIG;

  return {
    github: {
      authMode: oneOf(github.auth_mode, ['pat', 'app'] as const, 'github.auth_mode') ?? base.github.authMode,
      token: optionalString(github.token, 'github.token'),
      appId: optionalId(github.app_id, 'github.app_id'),
      privateKeyPath: optionalString(github.private_key_path, 'github.private_key_path'),
      installationId: positiveInteger(github.installation_id, 'github.installation_id'),
      webhookSecret: optionalString(github.webhook_secret, 'github.webhook_secret'),
      apiUrl: optionalString(github.api_url, 'github.api_url'),
      cloneBaseUrl: optionalString(github.clone_base_url, 'github.clone_base_url') ?? base.github.cloneBaseUrl,
    },
    llm: {
      provider: oneOf(llm.provider, ['openai'] as const, 'llm.provider') ?? base.llm.provider,
      model: optionalString(llm.model, 'llm.model') ?? base.llm.model,
      apiKey: optionalString(llm.api_key, 'llm.api_key'),
      baseUrl: optionalString(llm.base_url, 'llm.base_url') ?? base.llm.baseUrl,
      referer: optionalString(llm.referer, 'llm.referer'),
      title: optionalString(llm.title, 'llm.title'),
    },
    agent: {
      maxIterations: positiveInteger(agent.max_iterations, 'agent.max_iterations') ?? base.agent.maxIterations,
      baseBranch: optionalString(agent.base_branch, 'agent.base_branch') ?? base.agent.baseBranch,
      branchPrefix: optionalString(agent.branch_prefix, 'agent.branch_prefix') ?? base.agent.branchPrefix,
      triggerLabel: optionalString(agent.trigger_label, 'agent.trigger_label') ?? base.agent.triggerLabel,
      stateDir: optionalString(agent.state_dir, 'agent.state_dir') ?? base.agent.stateDir,
      stateBackend: oneOf(agent.state_backend, ['file', 'sqlite'] as const, 'agent.state_backend') ?? base.agent.stateBackend,
      logDir: optionalString(agent.log_dir, 'agent.log_dir') ?? base.agent.logDir,
      logLevel: oneOf(agent.log_level, LOG_LEVELS, 'agent.log_level') ?? base.agent.logLevel,
    },
    git: {
      authorName: optionalString(git.author_name, 'git.author_name') ?? base.git.authorName,
      authorEmail: optionalString(git.author_email, 'git.author_email') ?? base.git.authorEmail,
    },
    server: {
      port: positiveInteger(server.port, 'server.port') ?? base.server.port,
    },
  };
}

/** Overlay environment variables on top of a file-derived configuration. */
export function applyEnvironment(config: AgentConfig, env: NodeJS.ProcessEnv): AgentConfig {
  return {
    github: {
      authMode: oneOf(env.GITHUB_AUTH_MODE, ['pat', 'app'] as const, 'GITHUB_AUTH_MODE') ?? config.github.authMode,
      token: optionalString(env.GITHUB_TOKEN, 'GITHUB_TOKEN') ?? config.github.token,
      appId: optionalId(env.GITHUB_APP_ID, 'GITHUB_APP_ID') ?? config.github.appId,
      privateKeyPath:
        optionalString(env.GITHUB_APP_PRIVATE_KEY_PATH, 'GITHUB_APP_PRIVATE_KEY_PATH') ?? config.github.privateKeyPath,
      installationId:
        positiveInteger(env.GITHUB_APP_INSTALLATION_ID, 'GITHUB_APP_INSTALLATION_ID') ?? config.github.installationId,
      webhookSecret: optionalString(env.GITHUB_WEBHOOK_SECRET, 'GITHUB_WEBHOOK_SECRET') ?? config.github.webhookSecret,
      apiUrl: optionalString(env.GITHUB_API_URL, 'GITHUB_API_URL') ?? config.github.apiUrl,
      cloneBaseUrl: optionalString(env.GITHUB_CLONE_BASE_URL, 'GITHUB_CLONE_BASE_URL') ?? config.github.cloneBaseUrl,
    },
    llm: {
      provider: oneOf(env.LLM_PROVIDER, ['openai'] as const, 'LLM_PROVIDER') ?? config.llm.provider,
      model: optionalString(env.LLM_MODEL, 'LLM_MODEL') ?? config.llm.model,
      apiKey: optionalString(env.OPENAI_API_KEY, 'OPENAI_API_KEY') ?? config.llm.apiKey,
      baseUrl: optionalString(env.OPENAI_BASE_URL, 'OPENAI_BASE_URL') ?? config.llm.baseUrl,
      referer: optionalString(env.OPENROUTER_REFERER, 'OPENROUTER_REFERER') ?? config.llm.referer,
      title: optionalString(env.OPENROUTER_TITLE, 'OPENROUTER_TITLE') ?? config.llm.title,
    },
    agent: {
      maxIterations: positiveInteger(env.MAX_ITERATIONS, 'MAX_ITERATIONS') ?? config.agent.maxIterations,
      baseBranch: optionalString(env.BASE_BRANCH, 'BASE_BRANCH') ?? config.agent.baseBranch,
      branchPrefix: optionalString(env.BRANCH_PREFIX, 'BRANCH_PREFIX') ?? config.agent.branchPrefix,
      triggerLabel: optionalString(env.TRIGGER_LABEL, 'TRIGGER_LABEL') ?? config.agent.triggerLabel,
      stateDir: optionalString(env.STATE_DIR, 'STATE_DIR') ?? config.agent.stateDir,
      stateBackend: oneOf(env.STATE_BACKEND, ['file', 'sqlite'] as const, 'STATE_BACKEND') ?? config.agent.stateBackend,
      logDir: optionalString(env.LOG_DIR, 'LOG_DIR') ?? config.agent.logDir,
      logLevel: oneOf(env.LOG_LEVEL, LOG_LEVELS, 'LOG_LEVEL') ?? config.agent.logLevel,
    },
    git: {
      authorName: optionalString(env.GIT_AUTHOR_NAME, 'GIT_AUTHOR_NAME') ?? config.git.authorName,
      authorEmail: optionalString(env.GIT_AUTHOR_EMAIL, 'GIT_AUTHOR_EMAIL') ?? config.git.authorEmail,
    },
    server: {
      port: positiveInteger(env.PORT, 'PORT') ?? config.server.port,
    },
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitFile = options.configFile ?? optionalString(env.ISSUE_LOOP_CONFIG, 'ISSUE_LOOP_CONFIG');
  const configPath = resolve(cwd, explicitFile ?? DEFAULT_CONFIG_FILE);

  let fromFile = cloneConfig(DEFAULT_CONFIG);
  if (existsSync(configPath)) {
    fromFile = parseConfigFile(readFileSync(configPath, 'utf-8'), configPath);
  } else if (explicitFile) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  return applyEnvironment(fromFile, env);
}

export function requireGitHubToken(config: AgentConfig): string {
  if (!config.github.token) {
    throw new ConfigError(
      'GitHub token not provided.\n' +
      'Either:\n' +
      '  1. Set GITHUB_TOKEN environment variable\n' +
      '  2. Set github.token in the configuration file'
    );
  }
  return config.github.token;
}

export function requireGitHubApp(config: AgentConfig): GitHubAppCredentials {
  const { appId, privateKeyPath, installationId } = config.github;
  if (!appId || !privateKeyPath) {
    throw new ConfigError(
      'GitHub App authentication requires an app id and a private key.\n' +
      'Set GITHUB_APP_ID and GITHUB_APP_PRIVATE_KEY_PATH, or github.app_id and github.private_key_path'
    );
  }

  let privateKey: string;
  try {
    privateKey = readFileSync(resolve(privateKeyPath), 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read GitHub App private key ${privateKeyPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return { appId, privateKey, installationId };
}

export function cloneConfig(config: AgentConfig): AgentConfig {
  return {
    github: { ...config.github },
    llm: { ...config.llm },
    agent: { ...config.agent },
    git: { ...config.git },
    server: { ...config.server },
  };
}
