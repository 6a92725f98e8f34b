import { DateTime } from 'luxon';
import { OVERRIDE_DATETIME_FORMAT } from '../override-import.constants';

/**
 * Parses `YYYY-MM-DD HH:MM +HH:MM`. The text must survive a parse/format round
 * trip unchanged, so partial matches, out-of-range fields and unpadded values fail.
 */
export function parseOverrideDateTime(text: string): Date | null {
  const parsed = DateTime.fromFormat(text, OVERRIDE_DATETIME_FORMAT, { setZone: true });
  if (!parsed.isValid) return null;
  return parsed.toFormat(OVERRIDE_DATETIME_FORMAT) === text ? parsed.toJSDate() : null;
}

export function formatOverrideDateTime(value: Date, zone: string): string {
  return DateTime.fromJSDate(value, { zone }).toFormat(OVERRIDE_DATETIME_FORMAT);
}

export function isValidTimeZone(zone: string): boolean {
  return DateTime.now().setZone(zone).isValid;
}
