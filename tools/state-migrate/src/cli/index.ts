#!/usr/bin/env node
import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { templatesCommand } from './commands/templates.js';

const program = new Command();

program
  .name('state-migrate')
  .description('Map legacy per-region module state addresses onto the unified module layout')
  .version('0.1.0');

program.addCommand(generateCommand, { isDefault: true });
program.addCommand(templatesCommand);

program.parse();
