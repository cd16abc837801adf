import * as path from 'path';

import { requireGitHubApp, requireGitHubToken, type AgentConfig } from './config.js';
import { SqliteStateStore } from './database.js';
import { ErrorLog } from './error-log.js';
import type { WorkflowEventEmitter } from './events.js';
import { FileStateStore } from './file-state-store.js';
import { GitHubClient, type CodeHostClient } from './github-client.js';
import { createLLMClient, type LLMClient } from './llm-client.js';
import { Logger } from './logger.js';
import { IssueWorkflow } from './orchestrator.js';
import type { StateStore } from './storage.js';

export function initializeLogging(config: AgentConfig, verbose = false): Logger {
  return Logger.initialize({
    logDir: path.resolve(config.agent.logDir),
    minLevel: verbose ? 'debug' : config.agent.logLevel,
    echo: verbose,
  });
}

export function createStateStore(config: AgentConfig): StateStore {
  const stateDir = path.resolve(config.agent.stateDir);
  return config.agent.stateBackend === 'sqlite' ? new SqliteStateStore(stateDir) : new FileStateStore(stateDir);
}

export function createGitHubClient(config: AgentConfig): GitHubClient {
  if (config.github.authMode === 'app') {
    return new GitHubClient({ app: requireGitHubApp(config), baseUrl: config.github.apiUrl });
  }
  return new GitHubClient({ token: requireGitHubToken(config), baseUrl: config.github.apiUrl });
}

export interface WorkflowDependencies {
  github?: CodeHostClient;
  llm?: LLMClient;
  store?: StateStore;
  eventEmitter?: WorkflowEventEmitter;
  silent?: boolean;
}

export function createIssueWorkflow(config: AgentConfig, dependencies: WorkflowDependencies = {}): IssueWorkflow {
  return new IssueWorkflow({
    github: dependencies.github ?? createGitHubClient(config),
    llm: dependencies.llm ?? createLLMClient(config.llm),
    store: dependencies.store ?? createStateStore(config),
    errorLog: new ErrorLog(path.resolve(config.agent.logDir)),
    config,
    eventEmitter: dependencies.eventEmitter,
    silent: dependencies.silent,
  });
}

/** One `processIssue` call that owns its state store and closes it afterwards. */
export async function processIssueOnce(
  config: AgentConfig,
  repo: string,
  issueNumber: number,
  dependencies: WorkflowDependencies = {},
): Promise<boolean> {
  const store = dependencies.store ?? createStateStore(config);
  try {
    return await createIssueWorkflow(config, { ...dependencies, store }).processIssue(repo, issueNumber);
  } finally {
    store.close();
  }
}
