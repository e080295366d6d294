#!/usr/bin/env node
import { Command } from 'commander';
import { fetchCommand } from './commands/fetch.js';
import { sweepCommand } from './commands/sweep.js';
import { nameCommand } from './commands/name.js';
import { exitWithError } from './utils/options.js';

const program = new Command();

program
  .name('shard-cache')
  .description('Size-bounded local disk cache for remote archive shards')
  .version('0.1.0');

program.addCommand(fetchCommand);
program.addCommand(sweepCommand);
program.addCommand(nameCommand);

program.parseAsync().catch(exitWithError);
