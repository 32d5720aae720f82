import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ExportFileError, errorMessage } from '../utils/errors';
import type { ExportFile } from '../types';

// null is treated the same as a missing key throughout
const optionalString = z.string().nullish();

export const attachedFileSchema = z
  .object({
    export_name: optionalString,
  })
  .passthrough();

export const uploadMetadataSchema = z
  .object({
    backend_upload_metadata: z
      .object({
        upload_ip: optionalString,
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const messageVersionSchema = z
  .object({
    created_date: optionalString,
  })
  .passthrough();

export const messageSchema = z
  .object({
    creator: z
      .object({
        email: optionalString,
      })
      .passthrough()
      .nullish(),
    created_date: optionalString,
    text: optionalString,
    attached_files: z.array(attachedFileSchema).nullish(),
    upload_metadata: z.array(uploadMetadataSchema).nullish(),
    previous_message_versions: z.array(messageVersionSchema).nullish(),
  })
  .passthrough();

export const exportFileSchema = z
  .object({
    messages: z.array(messageSchema).nullish(),
  })
  .passthrough();

export class ExportReader {
  /**
   * Read one messages.json. The conversation id is the name of the folder
   * holding the file. A document without a `messages` key has no messages.
   */
  async readExportFile(filePath: string): Promise<ExportFile> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ExportFileError(filePath, `could not be read (${errorMessage(error)})`, 'EXPORT_FILE_UNREADABLE');
    }

    return {
      filePath,
      conversationId: path.basename(path.dirname(filePath)),
      messages: this.parseExportContent(content, filePath),
    };
  }

  parseExportContent(content: string, filePath: string): ExportFile['messages'] {
    let raw: unknown;
    try {
      raw = JSON.parse(stripBom(content));
    } catch (error) {
      throw new ExportFileError(filePath, `is not valid JSON (${errorMessage(error)})`);
    }

    const parsed = exportFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExportFileError(filePath, `does not look like a Google Chat export (${describeIssue(parsed.error)})`);
    }

    return parsed.data.messages ?? [];
  }
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'unknown schema error';
  }
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
}
