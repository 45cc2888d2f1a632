import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { MissingCredentialError } from '../errors.js';
import type { LetterboxConfig } from './config.js';

/**
 * Resolve the GitHub token: environment variable first, then token file.
 */
export async function resolveToken(
  config: LetterboxConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<string> {
  const { tokenEnv, tokenFile } = config.auth;
  const checked = [`$${tokenEnv}`];

  const fromEnv = env[tokenEnv]?.trim();
  if (fromEnv) return fromEnv;

  if (tokenFile) {
    checked.push(tokenFile);
    try {
      const raw = await readFile(resolve(cwd, tokenFile), 'utf-8');
      const line = raw.split(/\r?\n/).map(l => l.trim()).find(Boolean);
      if (line) return line;
    } catch {
      // Unreadable token file counts as missing
    }
  }

  throw new MissingCredentialError(checked);
}
