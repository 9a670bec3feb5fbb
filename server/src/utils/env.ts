// server/src/utils/env.ts
// Typed readers for process.env; bad values log a warning and use the default

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

function read(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  return raw ? raw : undefined;
}

export function getEnvBoolean(key: string, defaultValue = false): boolean {
  const raw = read(key)?.toLowerCase();
  if (raw === undefined) return defaultValue;
  if (TRUTHY.has(raw)) return true;
  if (FALSY.has(raw)) return false;

  console.warn(`[config] ${key}=${raw} is not a flag; using ${defaultValue}`);
  return defaultValue;
}

export interface NumberBounds {
  min?: number;
  max?: number;
  integer?: boolean;
}

export function getEnvNumber(key: string, defaultValue: number, bounds: NumberBounds = {}): number {
  const raw = read(key);
  if (raw === undefined) return defaultValue;

  const parsed = Number(raw);
  const problem = !Number.isFinite(parsed)
    ? "is not a number"
    : bounds.integer && !Number.isInteger(parsed)
      ? "is not an integer"
      : bounds.min !== undefined && parsed < bounds.min
        ? `is below ${bounds.min}`
        : bounds.max !== undefined && parsed > bounds.max
          ? `is above ${bounds.max}`
          : null;
  if (problem) {
    console.warn(`[config] ${key}=${raw} ${problem}; using ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/** Comma-separated list; blank entries are dropped. */
export function getEnvList(key: string, defaultValue: string[]): string[] {
  const raw = read(key);
  if (raw === undefined) return defaultValue;
  return raw.split(",").map((v) => v.trim()).filter(Boolean);
}
