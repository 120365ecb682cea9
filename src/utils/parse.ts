/**
 * Parse-or-default combinators. Every numeric and date field read from the
 * sheet goes through these so a bad cell never fails a request.
 */

export type Parser<T> = (raw: string) => T | undefined;

export const parseOr =
  <T>(parser: Parser<T>) =>
  (raw: unknown, fallback: T): T => {
    if (raw === undefined || raw === null) return fallback;
    const text = String(raw).trim();
    if (text === "") return fallback;
    const parsed = parser(text);
    return parsed === undefined ? fallback : parsed;
  };

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const toNumber: Parser<number> = (raw) =>
  NUMBER_PATTERN.test(raw) ? Number(raw) : undefined;

export const toInteger: Parser<number> = (raw) =>
  INTEGER_PATTERN.test(raw) ? Number(raw) : undefined;

// Calendar day as a UTC epoch in milliseconds, so days compare as numbers.
export const toDay: Parser<number> = (raw) => {
  const match = ISO_DATE_PATTERN.exec(raw);
  if (!match) return undefined;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const stamp = Date.UTC(year, month - 1, day);
  const check = new Date(stamp);
  // rejects 2024-02-30 and friends
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return undefined;
  }
  return stamp;
};

export const parseNumber = parseOr(toNumber);
export const parseInteger = parseOr(toInteger);
export const parseDay = parseOr(toDay);

export const EARLIEST_DAY = Number.NEGATIVE_INFINITY;
export const LATEST_DAY = Number.POSITIVE_INFINITY;

export const dayOf = (date: Date): number =>
  Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());

export const parseQuantity = (raw: unknown): number =>
  typeof raw === "number"
    ? Number.isInteger(raw)
      ? raw
      : 1
    : parseInteger(raw, 1);
