/**
 * Wording Update
 *
 * Injects one pasted paragraph into every base template and writes the
 * results under the letters folder, keeping file names.
 */

import { posix } from 'path';
import { InvalidParagraphError, errorMessage } from '../errors.js';
import { replaceBetween } from '../regions/region-parser.js';
import type { TemplateStore } from '../repo/types.js';
import type { FileOutcome, ProgressCallback } from './outcomes.js';

export interface WordingUpdateOptions {
  paragraph: string;
  sourceFolder: string;
  targetFolder: string;
  startTag: string;
  endTag: string;
  dryRun?: boolean;
  onProgress?: ProgressCallback;
}

export async function runWordingUpdate(
  store: TemplateStore,
  options: WordingUpdateOptions
): Promise<FileOutcome[]> {
  const { paragraph, sourceFolder, targetFolder, startTag, endTag, dryRun = false, onProgress } = options;

  if (!paragraph.trim()) {
    throw new InvalidParagraphError();
  }

  const files = await store.list(sourceFolder);
  const outcomes: FileOutcome[] = [];

  for (const [i, file] of files.entries()) {
    try {
      const { text } = await store.read(file.path);
      const updated = replaceBetween(text, startTag, endTag, paragraph);
      const targetPath = posix.join(targetFolder, file.name);

      if (dryRun) {
        outcomes.push({ file: file.name, status: 'skipped', detail: `would write ${targetPath}` });
      } else {
        const result = await store.write(
          targetPath,
          updated,
          `Wording update: injected block into ${file.name}`
        );
        outcomes.push({ file: file.name, status: 'ok', detail: `${result.action} ${result.path}` });
      }
    } catch (error) {
      outcomes.push({ file: file.name, status: 'error', detail: errorMessage(error) });
    }
    onProgress?.(i + 1, files.length);
  }

  return outcomes;
}
