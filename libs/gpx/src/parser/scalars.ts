import { InvalidScalarValueError } from '../gpx.errors';
import { FIX_TYPES, type FixType } from '../model/gpx.types';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const YEAR = /^-?\d{4,}$/;
const DATE_TIME =
  /^(-?\d{4,})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?$/;

const MAX_DGPS_STATION = 1023;

export function parseDecimal(field: string, raw: string): number {
  const value = raw.trim();
  if (!DECIMAL.test(value)) {
    throw new InvalidScalarValueError(field, raw, 'expected a decimal number');
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidScalarValueError(field, raw, 'number is out of range');
  }
  return parsed;
}

export function parseNonNegativeInteger(field: string, raw: string): number {
  const value = raw.trim();
  const parsed = Number(value);
  if (!INTEGER.test(value) || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new InvalidScalarValueError(field, raw, 'expected a non-negative integer');
  }
  return parsed;
}

export function parseDegrees(field: string, raw: string): number {
  const parsed = parseDecimal(field, raw);
  if (parsed < 0 || parsed >= 360) {
    throw new InvalidScalarValueError(field, raw, 'expected degrees in [0, 360)');
  }
  return parsed;
}

export function parseDgpsStation(field: string, raw: string): number {
  const parsed = parseNonNegativeInteger(field, raw);
  if (parsed > MAX_DGPS_STATION) {
    throw new InvalidScalarValueError(field, raw, `expected a station id in [0, ${MAX_DGPS_STATION}]`);
  }
  return parsed;
}

export function parseYear(field: string, raw: string): number {
  const value = raw.trim();
  if (!YEAR.test(value)) {
    throw new InvalidScalarValueError(field, raw, 'expected a year');
  }
  return Number(value);
}

export function parseFix(field: string, raw: string): FixType {
  const value = raw.trim();
  const fix = FIX_TYPES.find((candidate) => candidate === value);
  if (!fix) {
    throw new InvalidScalarValueError(field, raw, `expected one of ${FIX_TYPES.join(', ')}`);
  }
  return fix;
}

/**
 * Parses an xsd:dateTime. Values without a zone designator are read as UTC;
 * fractional seconds beyond milliseconds are truncated.
 */
export function parseDateTime(field: string, raw: string): Date {
  const match = DATE_TIME.exec(raw.trim());
  if (!match) {
    throw new InvalidScalarValueError(field, raw, 'expected an ISO 8601 date-time');
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  const y = Number(year);
  const mo = Number(month) - 1;
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  const date = new Date(0);
  date.setUTCFullYear(y, mo, d);
  date.setUTCHours(h, mi, s, ms);

  const valid =
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === mo &&
    date.getUTCDate() === d &&
    date.getUTCHours() === h &&
    date.getUTCMinutes() === mi &&
    date.getUTCSeconds() === s;
  if (!valid) {
    throw new InvalidScalarValueError(field, raw, 'date-time is out of range');
  }

  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const offsetHours = Number(zone.slice(1, 3));
    const offsetMinutes = Number(zone.slice(4, 6));
    if (offsetHours > 14 || offsetMinutes > 59) {
      throw new InvalidScalarValueError(field, raw, 'time zone offset is out of range');
    }
    date.setTime(date.getTime() - sign * (offsetHours * 60 + offsetMinutes) * 60_000);
  }

  return date;
}
