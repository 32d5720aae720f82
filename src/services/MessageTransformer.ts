import path from 'path';
import { cleanGoogleDate, parseGoogleDate } from '../utils/googleDate';
import { toHyperlinkPath } from '../utils/paths';
import { TimestampParseError } from '../utils/errors';
import type { ChatRow, ExportFile, ExportMessage } from '../types';

export function senderOf(message: ExportMessage): string {
  return message.creator?.email ?? '';
}

/**
 * `created_date`, or for edited messages (seen on video uploads) the first
 * non-empty `created_date` among the previous versions.
 */
export function timestampOf(message: ExportMessage): string {
  if (message.created_date && cleanGoogleDate(message.created_date)) {
    return message.created_date;
  }

  for (const version of message.previous_message_versions ?? []) {
    if (version.created_date && cleanGoogleDate(version.created_date)) {
      return version.created_date;
    }
  }

  return '';
}

export function textOf(message: ExportMessage): string {
  return message.text ?? '';
}

export function attachmentNamesOf(message: ExportMessage): string[] {
  return (message.attached_files ?? []).map(file => file.export_name ?? '');
}

export function ipAddressOf(message: ExportMessage): string {
  const [firstUpload] = message.upload_metadata ?? [];
  return firstUpload?.backend_upload_metadata?.upload_ip ?? '';
}

export type TransformSource = Pick<ExportFile, 'filePath' | 'conversationId'>;

export interface TransformOptions {
  // When set, an unparseable timestamp is reported here and kept as the raw string
  onUnparsedTimestamp?: (error: TimestampParseError) => void;
}

/**
 * Map one exported message onto a worksheet row.
 *
 * @param workbookDir - directory of the output workbook; hyperlinks are relative to it
 * @throws TimestampParseError naming the raw value and the export file, unless
 *   `onUnparsedTimestamp` is given
 */
export function transformMessage(
  message: ExportMessage,
  source: TransformSource,
  workbookDir: string,
  options: TransformOptions = {}
): ChatRow {
  const attachments = attachmentNamesOf(message);
  const firstAttachment = attachments[0];
  const hyperlink = firstAttachment
    ? toHyperlinkPath(path.join(path.dirname(source.filePath), firstAttachment), workbookDir)
    : null;

  return {
    conversationId: source.conversationId,
    datetime: normalizeTimestamp(timestampOf(message), source.filePath, options),
    sender: senderOf(message),
    text: textOf(message),
    attachments,
    attachmentText: attachments.join('\n'),
    ipAddress: ipAddressOf(message),
    hyperlink,
  };
}

function normalizeTimestamp(raw: string, filePath: string, options: TransformOptions): Date | string | null {
  try {
    return parseGoogleDate(raw);
  } catch (error) {
    if (!(error instanceof TimestampParseError)) {
      throw error;
    }
    const located = error.withFile(filePath);
    if (!options.onUnparsedTimestamp) {
      throw located;
    }
    options.onUnparsedTimestamp(located);
    return raw;
  }
}
