export const SYSTEM_PROMPTS = {
  requirements: 'Return a concise, actionable summary.',
  json: 'Return only valid JSON. Do not include markdown.',
};

export const PROMPTS = {
  requirements: (
    issueContext: string,
  ) => `# Requirements analysis

You are preparing work for an automated code change. Read the issue below, including any follow-up comments, and summarize what must be built.

---
${issueContext}
---

Write a short list of concrete, testable requirements. Mention file names and behaviours explicitly when the issue names them. Do not propose an implementation.`,

  implementationPlan: (
    requirements: string,
    repoStructure: string,
    relevantFiles: string,
  ) => `# Implementation plan

Requirements:
---
${requirements}
---

Repository structure:
---
${repoStructure}
---

Relevant files:
---
${relevantFiles}
---

Respond with a JSON object in the following format:
{
  "summary": "one paragraph describing the approach",
  "steps": ["ordered implementation steps"],
  "files_to_modify": [{ "path": "path/to/file", "reason": "why it changes" }],
  "files_to_avoid": ["paths that must not change"],
  "acceptance_criteria": ["observable conditions that show the issue is resolved"]
}

IMPORTANT:
- Output ONLY valid JSON, no additional text or markdown formatting
- Keep the plan minimal: only touch files the requirements need`,

  codeGeneration: (
    requirements: string,
    repoStructure: string,
    context: string,
  ) => `# Code generation

Requirements:
---
${requirements}
---

Repository structure:
---
${repoStructure}
---

Context (relevant files, the agreed plan and reviewer feedback from earlier rounds):
---
${context}
---

Produce the complete new contents of every file that must change.

Respond with a JSON object in the following format:
{
  "files_to_modify": [
    { "path": "path/to/file", "action": "modify", "content": "full file contents" },
    { "path": "path/to/obsolete", "action": "delete" }
  ],
  "commit_message": "short imperative summary of the change"
}

IMPORTANT:
- Output ONLY valid JSON, no additional text or markdown formatting
- "content" must be the whole file, never a diff or a fragment
- Address every open task from the reviewer feedback`,

  reviewFeedback: (
    requirements: string,
    plan: string,
    diff: string,
    feedbackHistory: string,
  ) => `# Change review

Requirements:
---
${requirements}
---

Plan:
---
${plan}
---

Diff of the pull request:
---
${diff}
---

Feedback from earlier rounds:
---
${feedbackHistory}
---

Review the diff against the requirements and the plan.

Respond with a JSON object in the following format:
{
  "summary": "overall assessment",
  "tasks": [{ "message": "what still needs to change", "file": "path/to/file", "line": 12 }],
  "final_comment": "comment to post on the pull request"
}

IMPORTANT:
- Output ONLY valid JSON, no additional text or markdown formatting
- "file", "line" and "final_comment" are optional
- Return an empty "tasks" list when the change is complete`,

  issueCommentReview: (
    issueContext: string,
    commentBody: string,
    plan: string,
    feedbackHistory: string,
  ) => `# Issue comment triage

A new comment was added to an issue that is already being worked on.

Issue and discussion:
---
${issueContext}
---

New comment:
---
${commentBody}
---

Current plan:
---
${plan}
---

Review feedback so far:
---
${feedbackHistory}
---

Decide whether the new comment changes the requirements enough that the current plan and feedback must be discarded and the work restarted.

Respond with a JSON object in the following format:
{
  "restart": true or false,
  "summary": "what the comment asks for",
  "reason": "why a restart is or is not needed"
}

IMPORTANT:
- Output ONLY valid JSON, no additional text or markdown formatting
- Questions, thanks and status requests never require a restart`,

  pullRequestReview: (
    description: string,
    diff: string,
    ciResults: string,
  ) => `# Pull request review

Pull request description:
---
${description}
---

Diff:
---
${diff}
---

CI workflow runs:
---
${ciResults}
---

Review the change for correctness, code quality and failing checks.

Respond with a JSON object in the following format:
{
  "decision": "APPROVE" or "REQUEST_CHANGES" or "COMMENT",
  "summary": "overall assessment",
  "issues": [
    { "severity": "error" or "warning" or "info", "message": "description", "file": "path/to/file", "line": 123 }
  ]
}

IMPORTANT:
- Output ONLY valid JSON, no additional text or markdown formatting
- "file" and "line" are optional`,
};
