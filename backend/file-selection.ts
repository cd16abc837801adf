import { getLogger } from './logger.js';
import type { WorkingCopy } from './working-copy.js';

export const COMMON_FILES = ['README.md', 'package.json', 'tsconfig.json', 'pyproject.toml', 'requirements.txt'] as const;

export const MAX_SELECTED_FILES = 10;
export const MAX_SCORED_FILES = 8;
export const FALLBACK_FILE_COUNT = 3;
export const MAX_FILE_CHARS = 8000;
export const TRUNCATION_MARKER = '\n... [truncated]';

const PATH_PATTERN =
  /(?:\.\/|\/)?[\w./-]+\.(?:tsx|ts|jsx|js|mjs|cjs|json|py|md|txt|toml|ya?ml|go|rs|java|rb|css|html|sh)\b/g;
const KEYWORD_PATTERN = /[a-z0-9_-]+/g;

/** Distinct lowercase tokens longer than two characters. */
export function extractKeywords(text: string): string[] {
  const words = text.toLowerCase().match(KEYWORD_PATTERN) ?? [];
  return [...new Set(words.filter(word => word.length > 2))];
}

/** File paths mentioned in free text, in order of first appearance. */
export function extractPaths(text: string): string[] {
  const paths: string[] = [];
  for (const match of text.match(PATH_PATTERN) ?? []) {
    const normalized = match.replace(/^\.?\//, '');
    if (normalized && !paths.includes(normalized)) {
      paths.push(normalized);
    }
  }
  return paths;
}

export function selectRelevantFiles(filePaths: string[], description: string): string[] {
  const available = new Set(filePaths);
  const selected: string[] = [];

  for (const name of COMMON_FILES) {
    if (available.has(name)) {
      selected.push(name);
    }
  }

  for (const mentioned of extractPaths(description)) {
    if (available.has(mentioned) && !selected.includes(mentioned)) {
      selected.push(mentioned);
    }
  }

  const keywords = extractKeywords(description);
  const scored = filePaths
    .filter(filePath => !selected.includes(filePath))
    .map(filePath => {
      const lowered = filePath.toLowerCase();
      return { filePath, score: keywords.filter(keyword => lowered.includes(keyword)).length };
    })
    .filter(entry => entry.score > 0);
  // Array.prototype.sort is stable, so ties keep enumeration order.
  scored.sort((a, b) => b.score - a.score);
  selected.push(...scored.slice(0, MAX_SCORED_FILES).map(entry => entry.filePath));

  if (selected.length === 0) {
    selected.push(...filePaths.slice(0, FALLBACK_FILE_COUNT));
  }
  return selected.slice(0, MAX_SELECTED_FILES);
}

export function truncateContent(content: string, maxChars: number = MAX_FILE_CHARS): string {
  return content.length > maxChars ? content.substring(0, maxChars) + TRUNCATION_MARKER : content;
}

export interface FileSnippet {
  path: string;
  content: string;
}

export interface ContextBundle {
  repoStructure: string;
  selectedFiles: string[];
  snippets: FileSnippet[];
  /** What the prompts receive as "relevant files": snippets as JSON, or the structure when none were readable. */
  relevantFiles: string;
}

export function buildContextBundle(workingCopy: WorkingCopy, description: string): ContextBundle {
  const repoStructure = JSON.stringify(workingCopy.getRepoStructure(), null, 2);
  const selectedFiles = selectRelevantFiles(workingCopy.listFiles(), description);
  const snippets: FileSnippet[] = [];

  for (const filePath of selectedFiles) {
    try {
      snippets.push({ path: filePath, content: truncateContent(workingCopy.readFile(filePath)) });
    } catch (error) {
      getLogger()?.warn(
        'FileSelection',
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  getLogger()?.info('FileSelection', `Selected ${snippets.length} file(s): ${selectedFiles.join(', ')}`);
  return {
    repoStructure,
    selectedFiles,
    snippets,
    relevantFiles: snippets.length > 0 ? JSON.stringify(snippets, null, 2) : repoStructure,
  };
}
