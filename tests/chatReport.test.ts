import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, readdir } from 'fs/promises';
import { join } from 'path';
import { CommanderError } from 'commander';
import { ChatReport } from '../src/services/ChatReport';
import { convertCommand, runConvert } from '../src/commands/convert';
import { Logger } from '../src/utils/logger';
import { ExportFileError, TimestampParseError } from '../src/utils/errors';
import type { ReportResult } from '../src/types';
import { FULL_MESSAGE, hyperlinkOf, makeTempRoot, readSheet, removeTempRoot, writeExport } from './helpers';

let root: string;
const logger = Logger.silent();

beforeEach(async () => {
  root = await makeTempRoot();
});

afterEach(async () => {
  await removeTempRoot(root);
});

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function written(result: ReportResult) {
  if (result.status !== 'written') {
    throw new Error('Expected a workbook to be written');
  }
  return result;
}

describe('runConvert', () => {
  it('converts a single fully populated message verbatim', async () => {
    await writeExport(root, 'Groups/Space AAAA1234/messages.json', { messages: [FULL_MESSAGE] });

    expect(await runConvert(root, { logger })).toBe(0);

    const sheet = await readSheet(join(root, 'googleChats.xlsx'));
    expect(sheet.rowCount).toBe(2);
    expect(sheet.getCell('A2').value).toBe('Space AAAA1234');
    expect(sheet.getCell('B2').value).toEqual(new Date('2024-10-25T03:20:36.000Z'));
    expect(sheet.getCell('C2').value).toBe('alice@example.com');
    expect(sheet.getCell('D2').value).toBe('Quarterly numbers attached');
    expect(sheet.getCell('E2').text).toBe('File-chart.png');
    expect(hyperlinkOf(sheet.getCell('E2').value)).toBe('Groups/Space AAAA1234/File-chart.png');
    expect(sheet.getCell('F2').value).toBe('203.0.113.7');
  });

  it('exits 0 without writing a workbook when nothing is found', async () => {
    await writeExport(root, 'Users/user_info.json', {});

    expect(await runConvert(root, { logger })).toBe(0);
    expect(await exists(join(root, 'googleChats.xlsx'))).toBe(false);
  });

  it('exits 1 for a missing directory or a file', async () => {
    const filePath = await writeExport(root, 'not-a-dir.txt', 'x');

    expect(await runConvert(join(root, 'nope'), { logger })).toBe(1);
    expect(await runConvert(filePath, { logger })).toBe(1);
  });

  it('exits 1 and writes nothing in strict mode when a file is malformed', async () => {
    await writeExport(root, 'Good/messages.json', { messages: [FULL_MESSAGE] });
    await writeExport(root, 'Bad/messages.json', '{ not json');

    expect(await runConvert(root, { logger, strict: true })).toBe(1);
    expect((await readdir(root)).sort()).toEqual(['Bad', 'Good']);
  });

  it('skips malformed files outside strict mode', async () => {
    await writeExport(root, 'Good/messages.json', { messages: [FULL_MESSAGE] });
    await writeExport(root, 'Bad/messages.json', '{ not json');

    expect(await runConvert(root, { logger })).toBe(0);
    const sheet = await readSheet(join(root, 'googleChats.xlsx'));
    expect(sheet.rowCount).toBe(2);
    expect(sheet.getCell('A2').value).toBe('Good');
  });
});

describe('ChatReport.generate', () => {
  it('orders rows by sorted file path, then by position in the file', async () => {
    await writeExport(root, 'Space B/messages.json', { messages: [{ text: 'b1' }, { text: 'b2' }] });
    await writeExport(root, 'DM A/messages.json', { messages: [{ text: 'a1' }, { text: 'a2' }] });

    const result = written(await new ChatReport({ logger }).generate(root));

    expect(result.fileCount).toBe(2);
    expect(result.rowCount).toBe(4);
    const sheet = await readSheet(result.outputPath);
    expect([2, 3, 4, 5].map(index => [sheet.getCell(`A${index}`).value, sheet.getCell(`D${index}`).value])).toEqual([
      ['DM A', 'a1'],
      ['DM A', 'a2'],
      ['Space B', 'b1'],
      ['Space B', 'b2'],
    ]);
  });

  it('links the first of several attachments', async () => {
    await writeExport(root, 'Groups/Space X/messages.json', {
      messages: [{ attached_files: [{ export_name: 'a.png' }, { export_name: 'b.png' }] }],
    });

    const result = written(await new ChatReport({ logger }).generate(root));
    const sheet = await readSheet(result.outputPath);

    expect(sheet.getCell('E2').text).toBe('a.png\nb.png');
    expect(hyperlinkOf(sheet.getCell('E2').value)).toBe('Groups/Space X/a.png');
  });

  it('uses the revision timestamp and leaves the datetime empty when there is none', async () => {
    await writeExport(root, 'DM A/messages.json', {
      messages: [
        {
          text: 'edited video',
          previous_message_versions: [{ created_date: '' }, { created_date: 'Monday, March 4, 2024 at 9:00:00 PM UTC' }],
        },
        { text: 'no date' },
      ],
    });

    const result = written(await new ChatReport({ logger }).generate(root));
    const sheet = await readSheet(result.outputPath);

    expect(sheet.getCell('B2').value).toEqual(new Date('2024-03-04T21:00:00.000Z'));
    expect(sheet.getCell('B3').value).toBeNull();
  });

  it('returns empty for a tree without exports', async () => {
    expect(await new ChatReport({ logger }).generate(root)).toEqual({ status: 'empty', rootDir: root });
  });

  it('reports skipped files and keeps rows with unparsed timestamps', async () => {
    const bad = await writeExport(root, 'A Bad/messages.json', { messages: 'oops' });
    const odd = await writeExport(root, 'B Odd/messages.json', {
      messages: [{ created_date: 'sometime last week', text: 'still here' }],
    });

    const result = written(await new ChatReport({ logger }).generate(root));

    expect(result.fileCount).toBe(1);
    expect(result.rowCount).toBe(1);
    expect(result.issues).toEqual([
      {
        kind: 'file',
        filePath: bad,
        message: `${bad}: does not look like a Google Chat export (messages: Expected array, received string)`,
      },
      {
        kind: 'timestamp',
        filePath: odd,
        message: `Unrecognized timestamp "sometime last week" in ${odd}`,
        raw: 'sometime last week',
      },
    ]);

    const sheet = await readSheet(result.outputPath);
    expect(sheet.getCell('A2').value).toBe('B Odd');
    expect(sheet.getCell('B2').value).toBe('sometime last week');
    expect(sheet.getCell('D2').value).toBe('still here');
  });

  it('rethrows in strict mode', async () => {
    await writeExport(root, 'Bad/messages.json', { messages: 'oops' });
    await expect(new ChatReport({ logger }).generate(root, { strict: true })).rejects.toBeInstanceOf(ExportFileError);

    await removeTempRoot(root);
    root = await makeTempRoot();
    await writeExport(root, 'Odd/messages.json', { messages: [{ created_date: 'later' }] });
    await expect(new ChatReport({ logger }).generate(root, { strict: true })).rejects.toBeInstanceOf(
      TimestampParseError
    );
    expect(await exists(join(root, 'googleChats.xlsx'))).toBe(false);
  });
});

describe('convertCommand', () => {
  async function usageExitCode(args: string[]): Promise<number | undefined> {
    convertCommand.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    try {
      await convertCommand.parseAsync(args, { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      throw error;
    }
    return undefined;
  }

  it('exits 1 without a parent directory', async () => {
    expect(await usageExitCode([])).toBe(1);
  });

  it('exits 1 on more than one argument', async () => {
    expect(await usageExitCode(['first', 'second'])).toBe(1);
  });
});
