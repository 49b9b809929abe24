#!/usr/bin/env node
import { Command } from 'commander';
import { registerFill } from './commands/fill/index.js';

export const program = new Command();

program
  .name('l10n-autofill')
  .description('Fill empty l10n entries through machine translation, skipping non-UI strings')
  .version('0.1.0');

registerFill(program);

await program.parseAsync();
