import { createHash } from 'crypto';
import { posix } from 'path';
import { StaleVersionError } from '../errors.js';
import type { FileSnapshot, StoredFile, TemplateStore, WriteResult } from './types.js';

export interface Commit {
  path: string;
  message: string;
}

function versionOf(text: string): string {
  return createHash('sha1').update(text).digest('hex');
}

/**
 * In-process TemplateStore. Keeps a commit log so tests can assert
 * exactly what would have been pushed.
 */
export class MemoryTemplateStore implements TemplateStore {
  readonly files = new Map<string, string>();
  readonly commits: Commit[] = [];
  private failures = new Map<string, Error>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) {
      this.files.set(path, text);
    }
  }

  /** Make every read or write of `path` throw `error`. */
  failOn(path: string, error: Error): void {
    this.failures.set(path, error);
  }

  async list(folder: string): Promise<StoredFile[]> {
    return [...this.files.keys()]
      .filter(path => posix.dirname(path) === folder && path.toLowerCase().endsWith('.txt'))
      .sort()
      .map(path => ({ name: posix.basename(path), path }));
  }

  async read(path: string): Promise<FileSnapshot> {
    this.throwIfFailing(path);
    const text = this.files.get(path);
    if (text === undefined) {
      throw new Error(`Not found: ${path}`);
    }
    return { text, version: versionOf(text) };
  }

  async write(path: string, text: string, message: string, expectedVersion?: string): Promise<WriteResult> {
    this.throwIfFailing(path);
    const current = this.files.get(path);
    if (expectedVersion !== undefined) {
      const actual = current === undefined ? 'missing' : versionOf(current);
      if (actual !== expectedVersion) {
        throw new StaleVersionError(path, expectedVersion, actual);
      }
    }
    this.files.set(path, text);
    this.commits.push({ path, message });
    return { action: current === undefined ? 'created' : 'updated', path };
  }

  private throwIfFailing(path: string): void {
    const error = this.failures.get(path);
    if (error) throw error;
  }
}
