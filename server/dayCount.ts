/**
 * Day-count helpers shared by the basket engines.
 *
 * All differences are whole calendar days between UTC midnights, so a
 * maturity on 2026-03-20 is 20 days from 2026-02-28 regardless of the
 * time of day carried by either Date.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Money-market day count basis (ACT/360). */
export const DAYS_IN_YEAR = 360;

/** 1 bp as a decimal. */
export const BASIS_POINT = 0.0001;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Parse a loader date cell. Accepts Date, ISO strings (date part only is
 * used), MM/DD/YYYY and spreadsheet serial numbers. Returns null for
 * anything that does not resolve to a valid calendar date.
 */
export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(utcMidnight(value));
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    // Spreadsheet serial: day 25569 is 1970-01-01
    return new Date(Math.round(value - 25569) * MS_PER_DAY);
  }

  if (typeof value !== "string") return null;
  const text = value.trim();
  if (text === "") return null;

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return validDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = US_DATE.exec(text);
  if (us) {
    return validDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

function validDate(year: number, month: number, day: number): Date | null {
  const ms = Date.UTC(year, month - 1, day);
  const date = new Date(ms);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

/** Signed whole days from `from` to `to`. */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / MS_PER_DAY);
}

/** Days from `from` to `to`, never negative. */
export function clampedDaysBetween(from: Date, to: Date): number {
  return Math.max(0, daysBetween(from, to));
}

export function addDays(date: Date, days: number): Date {
  return new Date(utcMidnight(date) + days * MS_PER_DAY);
}

/** YYYY-MM-DD in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function minDate(dates: (Date | null)[]): Date | null {
  let best: Date | null = null;
  for (const d of dates) {
    if (d && (!best || d.getTime() < best.getTime())) best = d;
  }
  return best;
}

export function maxDate(dates: (Date | null)[]): Date | null {
  let best: Date | null = null;
  for (const d of dates) {
    if (d && (!best || d.getTime() > best.getTime())) best = d;
  }
  return best;
}
