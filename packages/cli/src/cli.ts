#!/usr/bin/env tsx
// @alertline/cli - CLI entry point

import { Command } from 'commander';
import { createConfigCommand, createDetectCommand, createSendCommand } from './commands/index.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('alertline')
  .description('Inspect and exercise Alertline notification settings')
  .version(VERSION);

// Add commands
program.addCommand(createConfigCommand());
program.addCommand(createDetectCommand());
program.addCommand(createSendCommand());

// Parse and run
await program.parseAsync();
