/**
 * Configuration
 *
 * `.letterbox/config.yaml` describes which repository to edit, where the
 * templates live and which markers delimit each editable region.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import type { SignatureLocation } from '../signatures/types.js';

export const CONFIG_DIR = '.letterbox';
export const CONFIG_FILE = 'config.yaml';

const markerPairSchema = z.object({
  startTag: z.string().min(1),
  endTag: z.string().min(1),
});

const locationSchema = markerPairSchema.extend({
  label: z.string().min(1),
});

export const configSchema = z.object({
  version: z.string().default('1.0'),
  repo: z
    .object({
      owner: z.string().default(''),
      name: z.string().default(''),
      branch: z.string().min(1).default('main'),
      workdir: z.string().min(1).default(join(CONFIG_DIR, 'repo')),
    })
    .default({}),
  folders: z
    .object({
      templates: z.string().min(1).default('base_templates'),
      letters: z.string().min(1).default('updated_letters'),
      liveSuffix: z.string().min(1).default('_live.txt'),
    })
    .default({}),
  wording: markerPairSchema.default({
    startTag: '<!-- start here -->',
    endTag: '<!-- end here -->',
  }),
  signatures: z
    .object({
      configPath: z.string().min(1).default('config/signatures.json'),
      locations: z.record(locationSchema).default({
        denver: {
          label: 'Denver',
          startTag: '<!-- denver sig start -->',
          endTag: '<!-- denver sig end -->',
        },
        wslope: {
          label: 'WSlope',
          startTag: '<!-- wslope sig start -->',
          endTag: '<!-- wslope sig end -->',
        },
      }),
    })
    .default({}),
  auth: z
    .object({
      tokenEnv: z.string().min(1).default('GITHUB_TOKEN'),
      tokenFile: z.string().nullable().default(null),
    })
    .default({}),
});

export type LetterboxConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: LetterboxConfig = configSchema.parse({});

export function parseConfig(raw: unknown): LetterboxConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid config at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

export function configPath(cwd: string): string {
  return join(cwd, CONFIG_DIR, CONFIG_FILE);
}

export async function loadConfig(cwd: string = process.cwd()): Promise<LetterboxConfig> {
  const path = configPath(cwd);
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch {
    throw new ConfigError(`No config found at ${path}. Run \`letterbox init\` first`);
  }

  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
  }
  return parseConfig(data);
}

/**
 * Config must name a repository before anything can be read from it.
 */
export function assertRepoConfigured(config: LetterboxConfig): void {
  if (!config.repo.owner || !config.repo.name) {
    throw new ConfigError('Set repo.owner and repo.name in .letterbox/config.yaml');
  }
}

export function getLocation(config: LetterboxConfig, key: string): SignatureLocation {
  const normalized = key.toLowerCase();
  const location = config.signatures.locations[normalized];
  if (!location) {
    const known = Object.keys(config.signatures.locations).join(', ');
    throw new ConfigError(`Unknown location "${key}". Known locations: ${known}`);
  }
  return { key: normalized, ...location };
}

export function listLocations(config: LetterboxConfig): SignatureLocation[] {
  return Object.entries(config.signatures.locations).map(([key, loc]) => ({ key, ...loc }));
}
