/**
 * Helpers reading environment variables with one set of coercion rules. Blank
 * values are treated as unset everywhere so an exported-but-empty variable
 * never overrides an explicit option.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Source consulted by the readers; defaults to {@link process.env}. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns a boolean when `name` holds a recognised literal ("1", "yes", "off", ...). */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
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

/** Returns a base-10 integer when `name` holds one inside the optional bounds. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed value of `name`, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}
