/**
 * Environment variable parsing helpers.
 *
 * Unset or empty variables yield undefined so callers can fall back to schema
 * defaults. Malformed values throw instead of being ignored.
 *
 * @module utils/env
 */

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function readEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.trim();
}

export function parseIntEnv(name: string): number | undefined {
  const raw = readEnv(name);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`Invalid integer env var ${name}: "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function parseFloatEnv(name: string): number | undefined {
  const raw = readEnv(name);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseBoolEnv(name: string): boolean | undefined {
  const raw = readEnv(name);
  if (raw === undefined) return undefined;
  const lowered = raw.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new Error(`Invalid boolean env var ${name}: "${raw}" (use true/false or 1/0)`);
}

export function parseStringEnv(name: string): string | undefined {
  return readEnv(name);
}

