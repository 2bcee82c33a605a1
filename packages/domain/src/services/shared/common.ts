import crypto from 'node:crypto';

import type { ActorContext } from '../../types.js';

export const DEFAULT_ACTOR: ActorContext = {
  actor: 'system',
  channel: 'system',
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const toIso = (date: Date): string => date.toISOString();

/** Calendar date (UTC) of an instant, as YYYY-MM-DD. */
export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const shiftIsoDate = (isoDate: string, days: number): string =>
  toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00.000Z`) + days * DAY_MS));

export const isCalendarDate = (value: string): boolean => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }

  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && toIsoDate(parsed) === value;
};

/** Renders integer cents as a two-place decimal string, e.g. 5000050 -> "50000.50". */
export const formatMinor = (minor: number): string => {
  const sign = minor < 0 ? '-' : '';
  const absolute = Math.abs(minor);
  const whole = Math.floor(absolute / 100);
  const cents = absolute % 100;
  return `${sign}${whole}.${String(cents).padStart(2, '0')}`;
};

/** Converts a decimal bound such as a filter value into cents. */
export const toMinorUnits = (value: number): number => Math.round(value * 100);

const DURATION_UNITS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

/** Parses `90`, `45s`, `5m`, `12h` or `1d` into seconds; `null` when unrecognised. */
export const parseExpiresIn = (expiresIn: string): number | null => {
  const match = /^(\d+)([smhd])?$/.exec(expiresIn.trim());
  if (!match) {
    return null;
  }

  const [, value = '', unit = 's'] = match;
  const seconds = Number.parseInt(value, 10) * (DURATION_UNITS[unit] ?? 1);
  return seconds > 0 ? seconds : null;
};

export const operationHash = (action: string, payloadJson: string): string =>
  crypto.createHash('sha256').update(`${action}:${payloadJson}`).digest('hex');
