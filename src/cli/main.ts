#!/usr/bin/env node

/**
 * uiverify CLI entry point.
 * Thin wrapper: all logic is delegated to core and queue.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerWorkerCommand,
  registerRunCommand,
  registerEnqueueCommand,
} from './commands.js';

const program = new Command();

program
  .name('uiverify')
  .description(
    'Test execution engine. Consumes generated UI test cases from a queue, runs them in Playwright, and checks screenshots against stored baselines.',
  )
  .version('0.1.0');

registerWorkerCommand(program);
registerRunCommand(program);
registerEnqueueCommand(program);

program.parse();
