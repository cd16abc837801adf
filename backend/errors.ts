export class PermissionError extends Error {
  constructor(public readonly repo: string) {
    super(
      `Token does not have push permissions for ${repo}. ` +
      'Update the token with repository write access.'
    );
    this.name = 'PermissionError';
  }
}

export class IterationLimitError extends Error {
  constructor(
    public readonly issueNumber: number,
    public readonly maxIterations: number,
  ) {
    super(`Issue #${issueNumber} reached the maximum of ${maxIterations} iterations`);
    this.name = 'IterationLimitError';
  }
}

export class StructuredOutputDecodeError extends Error {
  constructor(
    message: string,
    public readonly content: string,
  ) {
    super(message);
    this.name = 'StructuredOutputDecodeError';
  }
}

export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly stderr: string,
    public readonly exitCode: number | null,
  ) {
    super(`git ${args[0] ?? ''} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}: ${stderr.trim()}`);
    this.name = 'GitCommandError';
  }
}

export class StateCorruptedError extends Error {
  constructor(
    public readonly location: string,
    detail: string,
  ) {
    super(`Workflow state at ${location} is corrupted: ${detail}`);
    this.name = 'StateCorruptedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class LLMRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = false,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'LLMRequestError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
