export type ColumnKey = 'conversationId' | 'datetime' | 'sender' | 'text' | 'attachment' | 'ipAddress';

export type ColumnWidth = { mode: 'autofit' } | { mode: 'fixed'; width: number };

export interface ColumnConfig {
  key: ColumnKey;
  header: string;
  width: ColumnWidth;
  wrap: boolean;
}

export interface HeaderStyleConfig {
  fontColor: string; // ARGB
  fillColor: string; // ARGB
}

export interface ReportConfig {
  sheetName: string;
  outputFileName: string;
  exportFileName: string;
  columns: ColumnConfig[];
  autofitPadding: number;
  header: HeaderStyleConfig;
  hyperlinkColor: string; // ARGB
  dateFormat: string;
  // false reproduces wrapping only the final row's text/attachment cells
  wrapAllRows: boolean;
}
