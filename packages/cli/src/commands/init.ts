import { existsSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';

import { CONFIG_FILENAME, ConfigError, loadConfig, writeConfig } from '@armport/core';
import chalk from 'chalk';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(path: string, options: InitOptions): Promise<void> {
  const projectDir = resolve(path);
  const configPath = join(projectDir, CONFIG_FILENAME);

  // Check existing config
  if (existsSync(configPath) && !options.force) {
    throw new ConfigError(`Already initialized (${CONFIG_FILENAME} exists). Use --force to overwrite.`);
  }

  // Defaults only; an existing file is being replaced
  const config = loadConfig({ projectDir, skipFile: true });
  config.project.name = basename(projectDir);

  writeConfig(config, projectDir);

  console.error(chalk.green(`Initialized ${CONFIG_FILENAME} in ${projectDir}`));
  console.error(chalk.gray(`  target: ${config.migrate.targetArchitecture}`));
  console.error(chalk.gray(`  extensions: ${config.scan.extensions.join(' ')}`));
  console.error(chalk.gray('\nNext: armport scan .'));
}
