import os from 'os';
import path from 'path';

/**
 * Expand a leading "~" to the current user's home directory
 */
export function expandHome(input: string): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

/**
 * Path of `target` relative to the workbook's directory, with forward
 * slashes as spreadsheet hyperlinks expect.
 */
export function toHyperlinkPath(target: string, workbookDir: string): string {
  return path.relative(workbookDir, target).replace(/\\/g, '/');
}
