import { promises as fs } from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import type { Row, Workbook, Worksheet } from 'exceljs';
import { formatCellDate } from '../utils/googleDate';
import type { ChatRow } from '../types';
import type { ColumnKey, ReportConfig } from '../types/config';

type CellContent = string | Date | null;

export class WorkbookBuilder {
  private config: ReportConfig;
  private workbook: Workbook;
  private sheet: Worksheet;
  private longestLine: number[];
  private dataRows = 0;
  private finalized = false;

  constructor(config: ReportConfig) {
    this.config = config;
    this.workbook = new ExcelJS.Workbook();
    this.sheet = this.workbook.addWorksheet(config.sheetName, {
      views: [{ state: 'frozen', xSplit: 0, ySplit: 1, topLeftCell: 'A2' }],
    });
    this.longestLine = config.columns.map(() => 0);
    this.addHeader();
  }

  get rowCount(): number {
    return this.dataRows;
  }

  /**
   * Append one message row. Empty strings are written as empty cells.
   */
  addRow(row: ChatRow): void {
    if (this.finalized) {
      throw new Error('Cannot add rows after the workbook has been finalized');
    }

    const values = this.config.columns.map(column => cellContent(row, column.key));
    const excelRow = this.sheet.addRow(values.map(value => (value === '' ? null : value)));
    this.dataRows++;
    values.forEach((value, index) => this.measure(index, value));

    const datetimeIndex = this.columnNumber('datetime');
    if (datetimeIndex && row.datetime instanceof Date) {
      excelRow.getCell(datetimeIndex).numFmt = this.config.dateFormat;
    }

    const attachmentIndex = this.columnNumber('attachment');
    if (attachmentIndex && row.hyperlink) {
      const cell = excelRow.getCell(attachmentIndex);
      cell.value = { text: row.attachmentText, hyperlink: row.hyperlink };
      cell.font = { color: { argb: this.config.hyperlinkColor }, underline: true };
    }

    if (this.config.wrapAllRows) {
      this.applyWrap(excelRow);
    }
  }

  /**
   * Column widths, wrapping, and the header auto filter. Call once after the
   * last row.
   */
  finalize(): void {
    if (this.finalized) {
      return;
    }

    this.config.columns.forEach((column, index) => {
      const sheetColumn = this.sheet.getColumn(index + 1);
      sheetColumn.width =
        column.width.mode === 'fixed' ? column.width.width : this.longestLine[index] + this.config.autofitPadding;
    });

    if (!this.config.wrapAllRows && this.dataRows > 0) {
      this.applyWrap(this.sheet.getRow(this.sheet.rowCount));
    }

    const lastLetter = this.sheet.getColumn(this.config.columns.length).letter;
    this.sheet.autoFilter = `A1:${lastLetter}1`;
    this.finalized = true;
  }

  /**
   * Write the workbook in one step: a temporary file beside the target is
   * renamed into place once fully written.
   */
  async save(outputPath: string): Promise<void> {
    this.finalize();

    const tempPath = path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${process.pid}.tmp`);
    try {
      await this.workbook.xlsx.writeFile(tempPath);
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  private addHeader(): void {
    const headers = this.config.columns.map(column => column.header);
    const headerRow = this.sheet.addRow(headers);
    headers.forEach((header, index) => this.measure(index, header));

    headerRow.eachCell(cell => {
      cell.font = { bold: true, color: { argb: this.config.header.fontColor } };
      cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: this.config.header.fillColor } };
      cell.alignment = { horizontal: 'center', vertical: 'middle' };
    });
  }

  private applyWrap(row: Row): void {
    this.config.columns.forEach((column, index) => {
      if (column.wrap) {
        row.getCell(index + 1).alignment = { wrapText: true };
      }
    });
  }

  private measure(index: number, value: CellContent): void {
    if (value === null) {
      return;
    }
    const display = value instanceof Date ? formatCellDate(value) : value;
    const longest = display.split('\n').reduce((max, line) => Math.max(max, line.length), 0);
    this.longestLine[index] = Math.max(this.longestLine[index], longest);
  }

  private columnNumber(key: ColumnKey): number | undefined {
    const index = this.config.columns.findIndex(column => column.key === key);
    return index >= 0 ? index + 1 : undefined;
  }
}

function cellContent(row: ChatRow, key: ColumnKey): CellContent {
  switch (key) {
    case 'conversationId':
      return row.conversationId;
    case 'datetime':
      return row.datetime;
    case 'sender':
      return row.sender;
    case 'text':
      return row.text;
    case 'attachment':
      return row.attachmentText;
    case 'ipAddress':
      return row.ipAddress;
  }
}
