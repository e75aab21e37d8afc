/**
 * Environment readers used by the configuration loader. Blank values count
 * as unset; malformed values read as unset so the caller keeps its default.
 */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Base-10 integers only; values outside the safe integer range are rejected. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Comma-separated list matched case-insensitively against `allowed`. Unknown
 * entries are dropped and the canonical spelling is returned.
 */
export function readOptionalEnumList<T extends string>(name: string, allowed: readonly T[]): T[] | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }
  const values = normalised
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .flatMap((entry) => allowed.filter((value) => value.toLowerCase() === entry));
  return values.length > 0 ? Array.from(new Set(values)) : undefined;
}
