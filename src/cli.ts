#!/usr/bin/env node

// Точка входа CLI.
import { Command } from 'commander';
import { indexCommand } from './commands/index-cmd.js';
import { searchCommand } from './commands/search-cmd.js';

const program = new Command()
  .name('topicrun')
  .description('Batch topic runs against an inverted index')
  .version('0.1.0');

program.addCommand(searchCommand);
program.addCommand(indexCommand);

await program.parseAsync();
