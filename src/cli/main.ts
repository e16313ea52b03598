#!/usr/bin/env node

/**
 * wrightly CLI entry point.
 * Thin wrapper, all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerClassifyCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('wrightly')
  .description(
    'Drive a browser from a short YAML script, with default waits and automatic CSS/XPath selectors.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerClassifyCommand(program);

program.parse();
