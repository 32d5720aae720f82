import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { ChatReport } from '../services/ChatReport';
import { Logger } from '../utils/logger';
import { InvocationError, errorMessage } from '../utils/errors';
import { expandHome } from '../utils/paths';
import type { ReportIssue } from '../types';

export interface ConvertOptions {
  verbose?: boolean;
  strict?: boolean;
  logger?: Logger;
}

export const convertCommand = new Command('convert')
  .description('Convert every messages.json below a Google Chat export folder into googleChats.xlsx')
  .argument('<parentDirectory>', 'Folder to scan, e.g. ".../Google Chat/Groups" from an extracted export')
  .option('-v, --verbose', 'Show per-file details', false)
  .option('--strict', 'Stop at the first unreadable file or timestamp instead of skipping it', false)
  .allowExcessArguments(false)
  .action(async (parentDirectory: string, options: { verbose: boolean; strict: boolean }) => {
    const exitCode = await runConvert(parentDirectory, options);
    process.exit(exitCode);
  });

/**
 * Resolve the root, build the workbook, and report. Returns the exit code.
 */
export async function runConvert(parentDirectory: string, options: ConvertOptions = {}): Promise<number> {
  const logger = options.logger ?? new Logger({ verbose: options.verbose });

  try {
    const rootDir = await resolveRootDir(parentDirectory);
    const report = new ChatReport({ logger });
    const result = await report.generate(rootDir, { strict: options.strict });

    if (result.status === 'empty') {
      logger.warn(`No messages.json files found under ${rootDir}`);
      return 0;
    }

    reportIssues(logger, result.issues);
    logger.print(`Created Excel workbook: ${result.outputPath}`);
    return 0;
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

async function resolveRootDir(parentDirectory: string): Promise<string> {
  const rootDir = path.resolve(expandHome(parentDirectory));
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(rootDir)).isDirectory();
  } catch {
    throw new InvocationError(rootDir);
  }
  if (!isDirectory) {
    throw new InvocationError(rootDir);
  }
  return rootDir;
}

function reportIssues(logger: Logger, issues: ReportIssue[]): void {
  if (issues.length === 0) {
    return;
  }

  const skippedFiles = issues.filter(issue => issue.kind === 'file');
  const badTimestamps = issues.filter(issue => issue.kind === 'timestamp');

  if (skippedFiles.length > 0) {
    logger.warn(`⚠️  Skipped ${skippedFiles.length} export file(s):`);
    skippedFiles.forEach(issue => logger.warn(`   • ${issue.message}`));
  }

  if (badTimestamps.length > 0) {
    logger.warn(`⚠️  ${badTimestamps.length} row(s) kept their original timestamp text:`);
    badTimestamps.forEach(issue => logger.warn(`   • ${issue.message}`));
  }
}
