#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';

import {
  createGitHubClient,
  createIssueWorkflow,
  createStateStore,
  initializeLogging,
  processIssueOnce,
} from './bootstrap.js';
import { loadConfig, type AgentConfig } from './config.js';
import { describeError } from './errors.js';
import { createLLMClient } from './llm-client.js';
import { Logger } from './logger.js';
import { ReviewAgent } from './review-agent.js';
import { WebhookServer } from './webhook-server.js';

interface GlobalOptions {
  config?: string;
}

interface IssueOptions {
  repo: string;
  issue: number;
}

interface RunOptions extends IssueOptions {
  maxIterations?: number;
  verbose?: boolean;
}

interface ReviewOptions {
  repo: string;
  pr: number;
}

interface ServeOptions {
  port?: number;
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got: ${value}`);
  }
  return parsed;
};

const parseRepo = (value: string): string => {
  if (!/^[\w.-]+\/[\w.-]+$/.test(value)) {
    throw new InvalidArgumentError(`expected owner/name, got: ${value}`);
  }
  return value;
};

const program = new Command();

program
  .name('issue-loop')
  .description('Turn GitHub issues into reviewed pull requests with an LLM in the loop')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to the YAML configuration file (default: issue-loop.yml)');

const readConfig = (): AgentConfig => loadConfig({ configFile: program.opts<GlobalOptions>().config });

const banner = (title: string, rows: Array<[string, string]>): void => {
  console.log('═'.repeat(80));
  console.log(title);
  console.log('═'.repeat(80));
  for (const [label, value] of rows) {
    console.log(`${`${label}:`.padEnd(16)}${value}`);
  }
  console.log('═'.repeat(80));
};

const fail = (error: unknown): never => {
  console.error('\n' + '═'.repeat(80));
  console.error('✗✗✗ FAILED ✗✗✗');
  console.error('═'.repeat(80));
  console.error(describeError(error));
  console.error('═'.repeat(80));
  if (error instanceof Error && error.stack && process.env.DEBUG) {
    console.error('\nStack trace (DEBUG mode):');
    console.error(error.stack);
  }
  Logger.getInstance()?.close();
  process.exit(1);
};

program
  .command('run')
  .description('Process one issue: plan, implement, open a pull request and review it')
  .requiredOption('-r, --repo <owner/name>', 'Target repository', parseRepo)
  .requiredOption('-i, --issue <number>', 'Issue number', parsePositiveInt)
  .option('--max-iterations <count>', 'Maximum generate/review rounds', parsePositiveInt)
  .option('-v, --verbose', 'Log debug output to stderr')
  .action(async (options: RunOptions) => {
    const startTime = Date.now();
    try {
      const config = readConfig();
      if (options.maxIterations !== undefined) {
        config.agent.maxIterations = options.maxIterations;
      }
      initializeLogging(config, options.verbose);

      banner('ISSUE-LOOP - Issue Resolution', [
        ['Repository', options.repo],
        ['Issue', `#${options.issue}`],
        ['Model', `${config.llm.provider}/${config.llm.model}`],
        ['Base branch', config.agent.baseBranch],
        ['Max iterations', String(config.agent.maxIterations)],
        ['State backend', config.agent.stateBackend],
      ]);

      const success = await processIssueOnce(config, options.repo, options.issue);
      const elapsed = Math.floor((Date.now() - startTime) / 1000);

      console.log('\n' + '═'.repeat(80));
      console.log(success ? '✓✓✓ SUCCESS ✓✓✓' : '✗✗✗ FAILED ✗✗✗');
      console.log('═'.repeat(80));
      console.log(`Total time: ${Math.floor(elapsed / 60)}m ${elapsed % 60}s`);
      Logger.getInstance()?.close();
      process.exit(success ? 0 : 1);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('status')
  .description('Show the issue and its stored workflow state')
  .requiredOption('-r, --repo <owner/name>', 'Target repository', parseRepo)
  .requiredOption('-i, --issue <number>', 'Issue number', parsePositiveInt)
  .action(async (options: IssueOptions) => {
    try {
      const config = readConfig();
      const github = createGitHubClient(config);
      const issue = await github.getIssue(options.repo, options.issue);
      const store = createStateStore(config);
      const state = store.load(options.repo, options.issue);
      store.close();

      banner(`${options.repo}#${issue.number}: ${issue.title}`, [
        ['Issue state', issue.state],
        ['Workflow step', state ? state.step : 'not started'],
        ['Iteration', state ? `${state.iteration}/${config.agent.maxIterations}` : '-'],
        ['Pull request', state?.prNumber ? `#${state.prNumber}` : '-'],
        ['Reviews', state ? String(state.feedbackHistory.length) : '0'],
        ['Updated', state?.updatedAt ?? '-'],
      ]);
      if (state?.commentDecision) {
        console.log(`Last comment decision: restart=${state.commentDecision.restart} ${state.commentDecision.reason}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('reset')
  .description('Forget the stored workflow state for an issue')
  .requiredOption('-r, --repo <owner/name>', 'Target repository', parseRepo)
  .requiredOption('-i, --issue <number>', 'Issue number', parsePositiveInt)
  .action((options: IssueOptions) => {
    try {
      const store = createStateStore(readConfig());
      store.clear(options.repo, options.issue);
      store.close();
      console.log(`Cleared workflow state for ${options.repo}#${options.issue}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('review-pr')
  .description('Review a pull request and post the result as a GitHub review')
  .requiredOption('-r, --repo <owner/name>', 'Target repository', parseRepo)
  .requiredOption('-p, --pr <number>', 'Pull request number', parsePositiveInt)
  .action(async (options: ReviewOptions) => {
    try {
      const config = readConfig();
      initializeLogging(config);
      const github = createGitHubClient(config);
      const reviewer = new ReviewAgent(createLLMClient(config.llm), github);

      const pull = await github.getPullRequest(options.repo, options.pr);
      const review = await reviewer.reviewPullRequest(options.repo, options.pr, pull.body || pull.title || '');
      const output = resolve('review-results.json');
      writeFileSync(output, JSON.stringify(review, null, 2), 'utf-8');
      await reviewer.postReview(options.repo, options.pr, review);

      console.log(`Posted ${review.decision} review on ${options.repo}#${options.pr} (${review.issues.length} issue(s))`);
      console.log(`Saved review to ${output}`);
      Logger.getInstance()?.close();
    } catch (error) {
      fail(error);
    }
  });

program
  .command('config')
  .description('Print the effective configuration')
  .action(() => {
    try {
      const config = readConfig();
      banner('ISSUE-LOOP - Configuration', [
        ['Provider', config.llm.provider],
        ['Model', config.llm.model],
        ['LLM base URL', config.llm.baseUrl],
        ['Base branch', config.agent.baseBranch],
        ['Branch prefix', config.agent.branchPrefix],
        ['Max iterations', String(config.agent.maxIterations)],
        ['State backend', `${config.agent.stateBackend} (${config.agent.stateDir})`],
        ['Log directory', config.agent.logDir],
        ['GitHub auth', config.github.authMode === 'app' ? `GitHub App ${config.github.appId ?? '⚠ NOT SET'}` : 'token'],
        ['GitHub token', config.github.token ? '***provided***' : '⚠ NOT SET'],
        ['LLM API key', config.llm.apiKey ? '***provided***' : '⚠ NOT SET'],
      ]);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('check')
  .description('Verify GitHub and LLM access with one cheap call each')
  .option('-r, --repo <owner/name>', 'Also check push permission on this repository', parseRepo)
  .action(async (options: { repo?: string }) => {
    try {
      const config = readConfig();
      initializeLogging(config);
      const github = createGitHubClient(config);
      console.log(`✓ GitHub: authenticated as ${await github.describeIdentity(options.repo)}`);
      if (options.repo) {
        const canPush = await github.canPush(options.repo);
        console.log(`${canPush ? '✓' : '✗'} GitHub: push permission on ${options.repo}`);
      }

      const reply = await createLLMClient(config.llm).generate('Reply with the single word: ok');
      console.log(`✓ LLM: ${config.llm.model} replied "${reply.trim().substring(0, 40)}"`);
      Logger.getInstance()?.close();
    } catch (error) {
      fail(error);
    }
  });

program
  .command('serve')
  .description('Run the GitHub webhook server')
  .option('--port <number>', 'Port to listen on (default: 8000)', parsePositiveInt)
  .action(async (options: ServeOptions) => {
    try {
      const config = readConfig();
      initializeLogging(config);
      const store = createStateStore(config);
      const workflow = createIssueWorkflow(config, { store, silent: true });
      const server = new WebhookServer({
        port: options.port ?? config.server.port,
        secret: config.github.webhookSecret,
        routing: { triggerLabel: config.agent.triggerLabel, branchPrefix: config.agent.branchPrefix },
        dispatch: (repo, issueNumber) => workflow.processIssue(repo, issueNumber),
      });
      await server.start();

      const shutdown = (): void => {
        server
          .stop()
          .then(() => server.getQueue().drain())
          .then(() => {
            store.close();
            Logger.getInstance()?.close();
            process.exit(0);
          })
          .catch(fail);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
