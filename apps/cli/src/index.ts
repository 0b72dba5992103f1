#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { errorMessage } from '@stakewatch/logging';
import { runCommand } from './commands/run.js';
import { scheduleCommand } from './commands/schedule.js';

const program = new Command();

program
  .name('stakewatch')
  .description('Investor holdings and deals ingestion CLI')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(scheduleCommand);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
}
