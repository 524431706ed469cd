/**
 * Init command - write .roster/config.yaml for a project
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import { existsSync, mkdirSync, writeFileSync, readFileSync } from 'fs';
import { stringify as stringifyYAML } from 'yaml';
import { CONFIG_DIR, CONFIG_FILE, DEFAULT_CONFIG } from '@roster/core';

const GITIGNORE_ENTRIES = [`${CONFIG_DIR}/data/`, `${CONFIG_DIR}/*.log`];

/**
 * config.yaml content: the defaults, with the optional log file commented out.
 */
export function generateConfigYAML(): string {
  const yaml = stringifyYAML(
    {
      mode: DEFAULT_CONFIG.mode,
      server: DEFAULT_CONFIG.server,
      database: DEFAULT_CONFIG.database,
      logging: DEFAULT_CONFIG.logging,
    },
    { lineWidth: 0 }
  );

  return `# Roster configuration
# Environment overrides: ROSTER_MODE, NODE_ENV=production, PORT, ROSTER_DATABASE, ROSTER_LOG_LEVEL

${yaml}
# Also write logs (at debug level) to a file:
# logging:
#   file: ${CONFIG_DIR}/server.log
`;
}

export interface InitResult {
  configPath: string;
  /** False when a config already existed and force was not set */
  written: boolean;
  gitignoreUpdated: boolean;
}

/**
 * Create .roster/config.yaml under `projectPath`, and add the database and
 * log files to an existing .gitignore.
 */
export function initProject(projectPath: string, options: { force?: boolean } = {}): InitResult {
  const configDir = join(projectPath, CONFIG_DIR);
  const configPath = join(configDir, CONFIG_FILE);

  if (existsSync(configPath) && !options.force) {
    return { configPath, written: false, gitignoreUpdated: false };
  }

  mkdirSync(configDir, { recursive: true });
  writeFileSync(configPath, generateConfigYAML());

  let gitignoreUpdated = false;
  const gitignorePath = join(projectPath, '.gitignore');
  if (existsSync(gitignorePath)) {
    const gitignore = readFileSync(gitignorePath, 'utf-8');
    const missing = GITIGNORE_ENTRIES.filter((entry) => !gitignore.split('\n').includes(entry));
    if (missing.length > 0) {
      const separator = gitignore.endsWith('\n') || gitignore === '' ? '' : '\n';
      writeFileSync(gitignorePath, `${gitignore}${separator}\n# Roster\n${missing.join('\n')}\n`);
      gitignoreUpdated = true;
    }
  }

  return { configPath, written: true, gitignoreUpdated };
}

interface InitOptions {
  project: string;
  force?: boolean;
}

export const initCommand = new Command('init')
  .description('Create .roster/config.yaml in a project')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --force', 'Overwrite existing config')
  .addHelpText('after', `
Examples:
  roster init                         Initialize in current directory
  roster init --project ./my-project  Initialize in specific directory
  roster init --force                 Overwrite existing configuration
`)
  .action((options: InitOptions) => {
    const result = initProject(resolve(options.project), { force: options.force });

    if (!result.written) {
      console.log(`✓ Already initialized: ${result.configPath}`);
      console.log('  → Use --force to overwrite config');
      return;
    }

    console.log(`✓ Created ${result.configPath}`);
    if (result.gitignoreUpdated) {
      console.log('✓ Updated .gitignore');
    }
    console.log('');
    console.log('Next steps:');
    console.log('  1. Load sample data:  roster seed');
    console.log('  2. Start the API:     roster serve');
  });
