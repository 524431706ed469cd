/**
 * Loading shared by the commands: project path, config and logger.
 */

import { resolve } from 'path';
import { createLogger, loadConfig, type Logger, type RosterConfig } from '@roster/core';
import { exitWithFailure } from '../utils/errorFormatter.js';

export interface ProjectOptions {
  project: string;
}

export interface LoadedProject {
  projectPath: string;
  config: RosterConfig;
  logger: Logger;
}

export function loadProject(options: ProjectOptions): LoadedProject {
  const projectPath = resolve(options.project);
  let config: RosterConfig;
  try {
    config = loadConfig(projectPath);
  } catch (err) {
    exitWithFailure(err, ['Fix .roster/config.yaml, or run: roster init --force']);
  }
  const logger = createLogger(config.logging.level, { logFile: config.logging.file });
  return { projectPath, config, logger };
}
