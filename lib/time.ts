import { ValidationError } from '../errors';

// YYYY-MM-DD, optionally followed by [T ]HH:MM[:SS[.fff]] and a zone.
const ISO_INSTANT =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ]([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d)(\.\d{1,6})?)?(Z|[+-](?:[01]\d|2[0-3]):?[0-5]\d)?)?$/i;

const isCalendarDate = (year: number, month: number, day: number): boolean => {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const normalizeZone = (zone: string | undefined): string => {
  if (!zone || zone.toUpperCase() === 'Z') return 'Z';
  return zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
};

/**
 * Parses an ISO-8601 date or date-time. Values without a zone designator are
 * read as UTC rather than server-local time; a bare date is UTC midnight.
 */
export function parseInstant(value: string | undefined, field: string, required: true): Date;
export function parseInstant(value: string | undefined, field: string, required: false): Date | null;
export function parseInstant(value: string | undefined, field: string, required: boolean): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    if (required) throw new ValidationError(`${field} is required`);
    return null;
  }

  const match = ISO_INSTANT.exec(trimmed);
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    console.warn(`Invalid ${field} format: ${trimmed}`);
    throw new ValidationError(`Invalid ${field} format`);
  }

  const [, year, month, day, hours = '00', minutes = '00', seconds = '00', fraction = '', zone] = match;
  const millis = `${fraction.slice(1)}000`.slice(0, 3);
  return new Date(`${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${millis}${normalizeZone(zone)}`);
}
