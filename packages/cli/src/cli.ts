#!/usr/bin/env -S node --import tsx
/**
 * @roster/cli - command line for the Roster GraphQL API
 */

import { Command } from 'commander';
import { ROSTER_VERSION } from '@roster/core';
import { initCommand } from './commands/init.js';
import { seedCommand } from './commands/seed.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('roster')
  .description('GraphQL API over people and their comments')
  .version(ROSTER_VERSION);

program.addCommand(initCommand);
program.addCommand(seedCommand);
program.addCommand(serveCommand);

await program.parseAsync();
