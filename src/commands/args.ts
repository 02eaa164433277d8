import { UsageError } from "../errors.js";

/** Narrow a CLI string to one of `allowed`; undefined passes through. */
export function oneOf<T extends string>(flag: string, allowed: readonly T[], value: string | undefined): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new UsageError(`Invalid ${flag}: ${value} (expected ${allowed.join("|")})`, { flag, value });
  }
  return match;
}

export function requireOneOf<T extends string>(flag: string, allowed: readonly T[], value: string): T {
  const match = oneOf(flag, allowed, value);
  if (match === undefined) throw new UsageError(`Missing ${flag}`, { flag });
  return match;
}

/** "a,b, c" → ["a", "b", "c"]; undefined and blanks drop out. */
export function csv(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

export function positiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`Invalid ${flag}: ${value} (expected a positive integer)`, { flag, value });
  return n;
}
