#!/usr/bin/env node
import { Command } from 'commander';
import { registerStateCommand } from './commands/state.js';
import { registerCongressCommand } from './commands/congress.js';
import { closeDb } from './modules/state/db.js';

const program = new Command();

program
  .name('sponsor-stats')
  .description('Per-legislator sponsorship, enactment and bipartisan co-sponsorship statistics')
  .version('0.1.0');

registerStateCommand(program);
registerCongressCommand(program);

program
  .parseAsync()
  .then(() => closeDb())
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
