import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';

export async function makeTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'gchat-xlsx-'));
}

export async function removeTempRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Write `content` (JSON-encoded unless already a string) at root/relativePath
 */
export async function writeExport(root: string, relativePath: string, content: unknown): Promise<string> {
  const filePath = join(root, relativePath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filePath;
}

export async function readSheet(filePath: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  const sheet = workbook.getWorksheet('Messages');
  if (!sheet) {
    throw new Error(`No Messages sheet in ${filePath}`);
  }
  return sheet;
}

export function hyperlinkOf(value: CellValue): string | undefined {
  if (typeof value === 'object' && value !== null && 'hyperlink' in value) {
    return value.hyperlink;
  }
  return undefined;
}

export const FULL_MESSAGE = {
  creator: { name: 'Alice', email: 'alice@example.com', user_type: 'Human' },
  created_date: 'Friday, October 25, 2024 at 3:20:36 AM UTC',
  text: 'Quarterly numbers attached',
  attached_files: [{ original_name: 'chart.png', export_name: 'File-chart.png' }],
  upload_metadata: [
    {
      backend_upload_metadata: { upload_ip: '203.0.113.7' },
    },
  ],
  topic_id: 'topic-1',
};
