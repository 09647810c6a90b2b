import { createConfigurationError } from '../errors.js';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/** Raw CLI or settings-file value to a finite number. */
export function asNumber(value: unknown, label: string): number {
  if (typeof value === 'number') {
    if (Number.isFinite(value)) {
      return value;
    }
  } else if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  throw createConfigurationError(`${label} must be a finite number.`, { value });
}

/** `true` comes from a bare CLI flag; strings come from `--flag <value>` or a settings file. */
export function asBoolean(value: unknown, label: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
  }

  throw createConfigurationError(`${label} must be true or false.`, { value });
}

export function asString(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw createConfigurationError(`${label} must be a string.`, { value });
  }
  return value;
}

export function asStringList(value: unknown, label: string): string[] {
  if (typeof value === 'string') {
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }

  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }

  throw createConfigurationError(`${label} must be a list of strings.`, { value });
}

/** Seconds (possibly fractional) to whole milliseconds. */
export function secondsToMs(value: number): number {
  return Math.round(value * 1_000);
}
