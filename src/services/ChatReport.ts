import path from 'path';
import { findExportFiles } from './ExportDiscovery';
import { ExportReader } from './ExportReader';
import { transformMessage } from './MessageTransformer';
import type { TransformOptions } from './MessageTransformer';
import { WorkbookBuilder } from './WorkbookBuilder';
import { getDefaultReportConfig } from './ReportConfig';
import { Logger } from '../utils/logger';
import { ExportFileError } from '../utils/errors';
import type { ReportConfig } from '../types/config';
import type { ExportFile, ReportIssue, ReportOptions, ReportResult } from '../types';

export interface ChatReportDeps {
  config?: ReportConfig;
  logger?: Logger;
  reader?: ExportReader;
}

/**
 * Runs the whole conversion for one export root: discovery, parsing, one
 * row per message, then a single save of the workbook.
 */
export class ChatReport {
  private config: ReportConfig;
  private logger: Logger;
  private reader: ExportReader;

  constructor(deps: ChatReportDeps = {}) {
    this.config = deps.config ?? getDefaultReportConfig();
    this.logger = deps.logger ?? Logger.silent();
    this.reader = deps.reader ?? new ExportReader();
  }

  getOutputPath(rootDir: string): string {
    return path.join(rootDir, this.config.outputFileName);
  }

  async discover(rootDir: string): Promise<string[]> {
    return findExportFiles(rootDir, { fileName: this.config.exportFileName, logger: this.logger });
  }

  /**
   * With `strict`, the first unreadable file or bad timestamp is rethrown and
   * nothing is written. Otherwise bad files are skipped, rows with a bad
   * timestamp keep the raw value, and both are returned as issues.
   */
  async generate(rootDir: string, options: ReportOptions = {}): Promise<ReportResult> {
    const files = await this.discover(rootDir);
    if (files.length === 0) {
      return { status: 'empty', rootDir };
    }

    this.logger.info(`Found ${files.length} ${this.config.exportFileName} file(s). Beginning to parse.`);
    return this.writeReport(rootDir, files, options);
  }

  async writeReport(rootDir: string, files: string[], options: ReportOptions = {}): Promise<ReportResult> {
    const outputPath = this.getOutputPath(rootDir);
    const workbookDir = path.dirname(outputPath);
    const builder = new WorkbookBuilder(this.config);
    const issues: ReportIssue[] = [];
    let fileCount = 0;

    const spinner = this.logger.spinner(`Parsing ${files.length} export file(s)...`).start();

    try {
      for (const filePath of files) {
        spinner.text = `Parsing ${path.relative(rootDir, filePath)}`;

        let exportFile: ExportFile;
        try {
          exportFile = await this.reader.readExportFile(filePath);
        } catch (error) {
          if (error instanceof ExportFileError && !options.strict) {
            issues.push({ kind: 'file', filePath, message: error.message });
            continue;
          }
          throw error;
        }

        fileCount++;
        this.logger.debug(`${exportFile.conversationId}: ${exportFile.messages.length} message(s)`);

        const transformOptions: TransformOptions = options.strict
          ? {}
          : {
              onUnparsedTimestamp: error => {
                issues.push({ kind: 'timestamp', filePath, message: error.message, raw: error.raw });
              },
            };

        for (const message of exportFile.messages) {
          builder.addRow(transformMessage(message, exportFile, workbookDir, transformOptions));
        }
      }
    } catch (error) {
      spinner.fail('Parsing failed');
      throw error;
    }

    spinner.succeed(`Parsed ${builder.rowCount} message(s) from ${fileCount} file(s)`);

    await builder.save(outputPath);

    return {
      status: 'written',
      rootDir,
      outputPath,
      fileCount,
      rowCount: builder.rowCount,
      issues,
    };
  }
}
