import { getLogger } from './logger.js';
import type { ImplementationPlan, IssueComment, RestartDecision, ReviewFeedback } from './models.js';

export interface RestartDecider {
  decideRestart(
    issueContext: string,
    commentBody: string,
    plan: ImplementationPlan | undefined,
    feedbackHistory: ReviewFeedback[],
  ): Promise<RestartDecision>;
}

export interface RestartGateInput {
  issueContext: string;
  latestComment?: IssueComment;
  lastIssueCommentId?: number;
  plan?: ImplementationPlan;
  feedbackHistory: ReviewFeedback[];
}

export type RestartGateResult =
  | { evaluated: false }
  | { evaluated: true; commentId: number; decision: RestartDecision };

/**
 * Issue context as the models see it: trimmed body, then every non-empty
 * comment as a `COMMENT:` block.
 */
export function buildIssueContext(body: string, comments: IssueComment[]): string {
  const lines = body.trim() ? [body.trim()] : [];
  for (const comment of comments) {
    const commentText = comment.body.trim();
    if (commentText) {
      lines.push(`\nCOMMENT:\n${commentText}`);
    }
  }
  return lines.join('\n');
}

export class RestartGate {
  constructor(private readonly decider: RestartDecider) {}

  /** Only consults the model when the newest comment has not been considered yet. */
  async evaluate(input: RestartGateInput): Promise<RestartGateResult> {
    const latest = input.latestComment;
    if (!latest || latest.id === input.lastIssueCommentId) {
      return { evaluated: false };
    }

    const decision = await this.decider.decideRestart(
      input.issueContext,
      latest.body,
      input.plan,
      input.feedbackHistory,
    );
    getLogger()?.info(
      'RestartGate',
      `Comment ${latest.id}: restart=${decision.restart}${decision.reason ? ` (${decision.reason})` : ''}`
    );
    return { evaluated: true, commentId: latest.id, decision };
  }
}
