import fs from 'node:fs';
import path from 'node:path';

import type { EnvSource } from './config.js';

import { warn } from './utils.js';

export const DEFAULT_ENV_FILE = '.env';

export function parseEnvFile(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  const lines = content.split(/\r?\n/);
  lines.forEach((line) => {
    const l = line.trim();
    if (l.length === 0 || l.startsWith('#')) return;
    const eq = l.indexOf('=');
    if (eq <= 0) return;
    const keyRaw = l.slice(0, eq).trim();
    const key = keyRaw.startsWith('export ')
      ? keyRaw.slice('export '.length).trim()
      : keyRaw;
    let val = l.slice(eq + 1).trim();
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (key.length > 0) out[key] = val;
  });
  return out;
}

export class EnvFileError extends Error {
  readonly path: string;

  constructor(filePath: string, message: string) {
    super(`failed to read env file ${filePath}: ${message}`);
    this.name = 'EnvFileError';
    this.path = filePath;
  }
}

/**
 * Merges an optional `.env` file under the process environment; real
 * environment variables win. An explicitly named file must exist, the
 * default `./.env` is read only when present.
 */
export function resolveEnvironment(opts: {
  env: EnvSource;
  envFile?: string;
  cwd?: string;
}): Record<string, string | undefined> {
  const cwd = opts.cwd ?? process.cwd();
  const explicit = typeof opts.envFile === 'string' && opts.envFile.length > 0;
  const filePath = path.resolve(cwd, explicit ? (opts.envFile ?? DEFAULT_ENV_FILE) : DEFAULT_ENV_FILE);

  let fileLayer: Record<string, string> = {};
  if (fs.existsSync(filePath)) {
    try {
      fileLayer = parseEnvFile(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      if (explicit) throw new EnvFileError(filePath, message);
      warn(`failed to read env file: ${filePath}: ${message}`);
    }
  } else if (explicit) {
    throw new EnvFileError(filePath, 'file not found');
  }

  const merged: Record<string, string | undefined> = { ...fileLayer };
  Object.entries(opts.env).forEach(([key, value]) => {
    if (value !== undefined) merged[key] = value;
  });
  return merged;
}
