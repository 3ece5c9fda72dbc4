#!/usr/bin/env node
/**
 * wikisql CLI
 *
 * Convert MediaWiki SQL dumps to CSV.
 */

import { Command } from 'commander';
import { convertCommand } from './cli/convert.js';
import { tablesCommand } from './cli/tables.js';

const program = new Command()
  .name('wikisql')
  .description('Convert MediaWiki SQL dumps (page, categorylinks, redirect, ...) to CSV')
  .version('0.1.0');

// Register commands
program.addCommand(convertCommand);
program.addCommand(tablesCommand);

// Parse arguments
await program.parseAsync();
