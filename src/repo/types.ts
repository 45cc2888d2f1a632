export interface StoredFile {
  name: string;
  path: string;  // repo-relative, forward slashes
}

export interface FileSnapshot {
  text: string;
  version: string;
}

export interface WriteResult {
  action: 'created' | 'updated';
  path: string;
}

/**
 * Versioned store of text files, keyed by repo-relative path.
 */
export interface TemplateStore {
  /** Text files directly inside `folder`. A missing folder yields []. */
  list(folder: string): Promise<StoredFile[]>;
  read(path: string): Promise<FileSnapshot>;
  write(path: string, text: string, message: string, expectedVersion?: string): Promise<WriteResult>;
}
