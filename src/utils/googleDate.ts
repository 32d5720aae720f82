import { TimestampParseError } from './errors';

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

// e.g. "Friday, October 25, 2024 at 3:20:36 AM UTC"
const GOOGLE_DATE_PATTERN =
  /^(?<weekday>[A-Za-z]+),\s+(?<month>[A-Za-z]+)\s+(?<day>\d{1,2}),\s+(?<year>\d{4})\s+at\s+(?<hour>\d{1,2}):(?<minute>\d{2}):(?<second>\d{2})\s+(?<meridiem>AM|PM)\s+(?<zone>\S+)$/i;

/**
 * Undo the narrow no-break space Google puts before AM/PM, then trim.
 */
export function cleanGoogleDate(raw: string): string {
  return raw.replace(/\u202f/g, ' ').trim();
}

/**
 * Parse the human-readable `created_date` of a Google Chat export into a
 * UTC Date. The timezone label is always UTC in practice and is not checked.
 *
 * @returns null for an empty value
 * @throws TimestampParseError when the value does not follow the export format
 */
export function parseGoogleDate(raw: string): Date | null {
  const cleaned = cleanGoogleDate(raw);
  if (!cleaned) {
    return null;
  }

  const groups = GOOGLE_DATE_PATTERN.exec(cleaned)?.groups;
  if (!groups) {
    throw new TimestampParseError(raw);
  }

  const month = MONTHS.indexOf(groups.month.toLowerCase());
  const year = Number(groups.year);
  const day = Number(groups.day);
  const hour12 = Number(groups.hour);
  const minute = Number(groups.minute);
  const second = Number(groups.second);

  if (
    !WEEKDAYS.includes(groups.weekday.toLowerCase()) ||
    month < 0 ||
    hour12 < 1 ||
    hour12 > 12 ||
    minute > 59 ||
    second > 59 ||
    day < 1 ||
    day > daysInMonth(year, month)
  ) {
    throw new TimestampParseError(raw);
  }

  const isPm = groups.meridiem.toUpperCase() === 'PM';
  const hour = (hour12 % 12) + (isPm ? 12 : 0);

  return new Date(Date.UTC(year, month, day, hour, minute, second));
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Render a Date the way the datetime column displays it (UTC).
 */
export function formatCellDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
