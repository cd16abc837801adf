import { getLogger } from './logger.js';
import type { ChangeSet, FileEntry, FileOperation } from './models.js';
import { isJsonObject, type JsonObject, type JsonValue } from './structured-output.js';
import type { WorkingCopy } from './working-copy.js';

const DEFAULT_COMMIT_MESSAGE = 'Apply automated changes';

const renderContent = (content: JsonValue): string => {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content.map(line => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
  }
  return JSON.stringify(content, null, 2);
};

/** Decode one raw `files_to_modify` entry from model output. */
export function decodeFileEntry(raw: JsonValue): FileEntry {
  if (typeof raw === 'string') {
    return { action: 'unrecognized', raw, reason: 'entry is a plain string' };
  }
  if (!isJsonObject(raw)) {
    return { action: 'unrecognized', raw, reason: `entry is ${raw === null ? 'null' : Array.isArray(raw) ? 'an array' : typeof raw}` };
  }

  const filePath = raw.path;
  if (typeof filePath !== 'string' || filePath.trim() === '') {
    return { action: 'unrecognized', raw, reason: 'entry has no path' };
  }

  const action = raw.action ?? 'modify';
  if (action === 'delete') {
    return { action: 'delete', path: filePath };
  }
  if (action !== 'modify' && action !== 'create' && action !== 'update') {
    return { action: 'unrecognized', raw, reason: `unknown action ${JSON.stringify(action)}` };
  }

  const content = raw.content;
  if (content === undefined || content === null) {
    return { action: 'unrecognized', raw, reason: `modify entry for ${filePath} has no content` };
  }
  return { action: 'modify', path: filePath, content: renderContent(content) };
}

export function decodeChangeSet(payload: JsonObject): ChangeSet {
  const rawFiles = payload.files_to_modify;
  const entries = Array.isArray(rawFiles) ? rawFiles.map(decodeFileEntry) : [];
  const files: FileOperation[] = [];

  for (const entry of entries) {
    if (entry.action === 'unrecognized') {
      getLogger()?.warn('ChangeSet', `Skipping invalid file entry (${entry.reason}): ${JSON.stringify(entry.raw)}`);
      continue;
    }
    files.push(entry);
  }

  const message = payload.commit_message;
  return {
    files,
    commitMessage: typeof message === 'string' && message.trim() ? message.trim() : DEFAULT_COMMIT_MESSAGE,
  };
}

export function applyChangeSet(workingCopy: WorkingCopy, changeSet: ChangeSet): void {
  for (const file of changeSet.files) {
    if (file.action === 'delete') {
      workingCopy.deleteFile(file.path);
    } else {
      workingCopy.writeFile(file.path, file.content);
    }
  }
  getLogger()?.info('ChangeSet', `Applied ${changeSet.files.length} file operation(s)`);
}
