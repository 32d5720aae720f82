#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { convertCommand } from './commands/convert';

const program = new Command();

const banner = `
╭─────────────────────────────────────╮
│                                     │
│    Google Chat → Excel Converter    │
│    Version 1.0.0                    │
│                                     │
╰─────────────────────────────────────╯
`;

program
  .name('gchat-xlsx')
  .description('Convert Google Chat messages.json exports into a single Excel workbook')
  .version('1.0.0')
  .addHelpText('before', chalk.cyan(banner));

// `gchat-xlsx <dir>` runs convert
program.addCommand(convertCommand, { isDefault: true });

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
