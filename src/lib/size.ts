import { InvalidUnitError, SizeParseError } from "./errors";

const MULTIPLIERS: Record<string, number> = { K: 1024, M: 1024 ** 2, G: 1024 ** 3 };

export type SizeInput = string | number | undefined;

/**
 * Turn "512", "4k", "500M" or "2G" into a byte count. Numbers and undefined
 * pass through unchanged.
 */
export function resolveSuffix(value: string | number): number;
export function resolveSuffix(value: SizeInput): number | undefined;
export function resolveSuffix(value: SizeInput): number | undefined {
  if (value === undefined || typeof value === "number") return value;
  const v = value.trim();
  const unit = v.slice(-1);
  if (/[a-z]/i.test(unit)) {
    const mult = MULTIPLIERS[unit.toUpperCase()];
    if (mult === undefined) throw new InvalidUnitError(value);
    return parseInteger(v.slice(0, -1), value) * mult;
  }
  return parseInteger(v, value);
}

function parseInteger(digits: string, original: string): number {
  if (!/^\d+$/.test(digits)) throw new SizeParseError(original);
  return Number(digits);
}
