#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { GrammarRegistry } from '@funcdelta/core';
import { registerExtractCommand } from './commands/extract.js';
import { registerCallsCommand } from './commands/calls.js';

const require = createRequire(import.meta.url);
const { version } = require('@funcdelta/cli/package.json') as { version: string };

const registry = new GrammarRegistry();

const program = new Command();
program
  .name('funcdelta')
  .description('Function-level commit analysis: changed functions, diffs and call graphs')
  .version(version);

registerExtractCommand(program, registry);
registerCallsCommand(program, registry);

await program.parseAsync();
