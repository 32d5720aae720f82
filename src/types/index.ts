import type { z } from 'zod';
import type { messageSchema } from '../services/ExportReader';

export type ExportMessage = z.infer<typeof messageSchema>;

export interface ExportFile {
  filePath: string;
  conversationId: string;
  messages: ExportMessage[];
}

export interface ChatRow {
  conversationId: string;
  // Raw string only when the timestamp could not be parsed in non-strict mode
  datetime: Date | string | null;
  sender: string;
  text: string;
  attachments: string[];
  attachmentText: string;
  ipAddress: string;
  hyperlink: string | null;
}

export type ReportIssueKind = 'file' | 'timestamp';

export interface ReportIssue {
  kind: ReportIssueKind;
  filePath: string;
  message: string;
  raw?: string;
}

export interface ReportOptions {
  strict?: boolean;
}

export type ReportResult =
  | { status: 'empty'; rootDir: string }
  | {
      status: 'written';
      rootDir: string;
      outputPath: string;
      fileCount: number;
      rowCount: number;
      issues: ReportIssue[];
    };
