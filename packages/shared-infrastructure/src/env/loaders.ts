/**
 * Environment helpers for service configuration: `.env` loading plus typed
 * readers that fall back to a default on unset, blank or unparseable values.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parseEnv } from 'node:util';

export interface LoadEnvOptions {
  /** Base directory for relative `files`. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Files read in order; defaults to `.env`. */
  files?: string[];
  /** Let file values replace variables already set in the process. */
  override?: boolean;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  /** Keys written into `process.env`; values are never reported. */
  assignedKeys: string[];
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const requested = options.files?.length ? options.files : ['.env'];
  const summary: LoadEnvSummary = { loadedFiles: [], missingFiles: [], assignedKeys: [] };
  const assigned = new Set<string>();

  for (const file of requested.map((name) => (isAbsolute(name) ? name : resolve(cwd, name)))) {
    if (!existsSync(file)) {
      summary.missingFiles.push(file);
      continue;
    }
    summary.loadedFiles.push(file);

    for (const [key, value] of Object.entries(parseEnv(readFileSync(file, 'utf8')))) {
      if (value === undefined) continue;
      if (!options.override && process.env[key] !== undefined) continue;
      process.env[key] = value;
      assigned.add(key);
    }
  }

  summary.assignedKeys = [...assigned];
  return summary;
}

function rawValue(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/** `1`, `true`, `yes` and `on` (any case) are true; any other value is false. */
export function readBool(name: string, def: boolean): boolean {
  const value = rawValue(name);
  return value === undefined ? def : TRUE_VALUES.has(value.toLowerCase());
}

export function readInt(name: string, def: number): number {
  const value = rawValue(name);
  if (value === undefined) return def;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : def;
}

export function readFloat(name: string, def: number): number {
  const value = rawValue(name);
  if (value === undefined) return def;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : def;
}

export function readString(name: string, def: string): string;
export function readString(name: string, def?: string): string | undefined;
export function readString(name: string, def?: string): string | undefined {
  return rawValue(name) ?? def;
}

/** Comma-separated list with blank entries dropped. */
export function readList(name: string, def: string[] = []): string[] {
  const value = rawValue(name);
  if (value === undefined) return def;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
