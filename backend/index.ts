export { IssueWorkflow, type IssueWorkflowConfig } from './orchestrator.js';
export { RestartGate, buildIssueContext, type RestartDecider, type RestartGateResult } from './restart-gate.js';
export { StructuredOutputParser, type JsonObject, type JsonValue } from './structured-output.js';
export { GitWorkingCopy, cloneWithGit, type WorkingCopy, type WorkingCopyFactory } from './working-copy.js';
export { decodeChangeSet, decodeFileEntry, applyChangeSet } from './change-set.js';
export { selectRelevantFiles, buildContextBundle } from './file-selection.js';
export { ReviewAgent, formatReviewComment } from './review-agent.js';
export { FileStateStore } from './file-state-store.js';
export { SqliteStateStore } from './database.js';
export { type StateStore, parseWorkflowState } from './storage.js';
export { ErrorLog, type ErrorRecord } from './error-log.js';
export { GitHubClient, type CodeHostClient, type GitHubAuthOptions } from './github-client.js';
export { GitHubAppAuth, type GitHubAppCredentials } from './github-app-auth.js';
export { OpenAICompatibleClient, createLLMClient, type LLMClient } from './llm-client.js';
export { loadConfig, DEFAULT_CONFIG, type AgentConfig, type GitHubAuthMode } from './config.js';
export { WebhookServer, resolveWebhookTargets, verifySignature } from './webhook-server.js';
export { KeyedTaskQueue } from './task-queue.js';
export { WorkflowEventEmitter, type WorkflowEvent } from './events.js';
export { PROMPTS } from './prompts.js';
export * from './errors.js';
export type * from './models.js';
