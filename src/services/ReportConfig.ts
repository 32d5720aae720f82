import type { ColumnConfig, ReportConfig } from '../types/config';

/**
 * Create the default workbook layout
 */
export function getDefaultReportConfig(): ReportConfig {
  return {
    sheetName: 'Messages',
    outputFileName: 'googleChats.xlsx',
    exportFileName: 'messages.json',
    columns: [
      { key: 'conversationId', header: 'chatID', width: { mode: 'autofit' }, wrap: false },
      { key: 'datetime', header: 'datetime UTC', width: { mode: 'autofit' }, wrap: false },
      { key: 'sender', header: 'sender', width: { mode: 'autofit' }, wrap: false },
      { key: 'text', header: 'text', width: { mode: 'fixed', width: 80 }, wrap: true },
      { key: 'attachment', header: 'attachment', width: { mode: 'fixed', width: 50 }, wrap: true },
      { key: 'ipAddress', header: 'IP address', width: { mode: 'autofit' }, wrap: false },
    ],
    autofitPadding: 2,
    header: {
      fontColor: 'FFFFFFFF',
      fillColor: 'FF000000',
    },
    hyperlinkColor: 'FF0563C1',
    dateFormat: 'yyyy-mm-dd hh:mm:ss',
    wrapAllRows: true,
  };
}

/**
 * Merge a partial override onto the defaults. Columns are replaced as a whole.
 */
export function resolveReportConfig(overrides: Partial<ReportConfig> = {}): ReportConfig {
  const defaultConfig = getDefaultReportConfig();
  const columns: ColumnConfig[] = (overrides.columns ?? defaultConfig.columns).map(column => ({
    ...column,
    width: { ...column.width },
  }));

  return {
    ...defaultConfig,
    ...overrides,
    columns,
    header: { ...defaultConfig.header, ...overrides.header },
  };
}
