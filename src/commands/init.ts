/**
 * Init Command
 *
 * Write .letterbox/config.yaml with the default folders and markers.
 */

import { mkdir, writeFile, access, readFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import yaml from 'js-yaml';
import { CONFIG_DIR, DEFAULT_CONFIG, configPath } from '../config/config.js';

interface InitOptions {
  force?: boolean;
  owner?: string;
  repo?: string;
  branch?: string;
}

const GITIGNORE_ENTRIES = `
# Letterbox
.letterbox/repo/
`;

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  const path = configPath(cwd);

  console.log(chalk.cyan('\n  Initializing Letterbox...\n'));

  try {
    await access(path);
    if (!options.force) {
      console.log(chalk.yellow('  Letterbox already initialized.'));
      console.log(chalk.dim('  Use --force to reinitialize.\n'));
      return;
    }
    console.log(chalk.dim('  Reinitializing (--force)...\n'));
  } catch {
    // Not initialized, continue
  }

  const config = {
    ...DEFAULT_CONFIG,
    repo: {
      ...DEFAULT_CONFIG.repo,
      owner: options.owner ?? DEFAULT_CONFIG.repo.owner,
      name: options.repo ?? DEFAULT_CONFIG.repo.name,
      branch: options.branch ?? DEFAULT_CONFIG.repo.branch,
    },
  };

  await mkdir(join(cwd, CONFIG_DIR), { recursive: true });
  const configYaml = yaml.dump(config, {
    indent: 2,
    lineWidth: 100,
    noRefs: true,
  });

  await writeFile(path, `# Letterbox configuration
# repo: the private template repository (token from $GITHUB_TOKEN or auth.tokenFile)
# signatures.locations: marker pairs for each signature region

${configYaml}`);
  console.log(chalk.green(`  ✓ Created ${CONFIG_DIR}/config.yaml`));

  const gitignorePath = join(cwd, '.gitignore');
  try {
    const existing = await readFile(gitignorePath, 'utf-8');
    if (!existing.includes('.letterbox/repo/')) {
      await writeFile(gitignorePath, existing + GITIGNORE_ENTRIES);
      console.log(chalk.green('  ✓ Updated .gitignore'));
    }
  } catch {
    await writeFile(gitignorePath, GITIGNORE_ENTRIES.trim() + '\n');
    console.log(chalk.green('  ✓ Created .gitignore'));
  }

  console.log(chalk.cyan('\n  Letterbox initialized!\n'));
  console.log(chalk.dim('  Next steps:'));
  if (!config.repo.owner || !config.repo.name) {
    console.log(chalk.dim('    1. Set repo.owner and repo.name in .letterbox/config.yaml'));
  } else {
    console.log(chalk.dim('    1. Review .letterbox/config.yaml'));
  }
  console.log(chalk.dim('    2. Export GITHUB_TOKEN'));
  console.log(chalk.dim('    3. Run `letterbox status` to check the repository\n'));
}
