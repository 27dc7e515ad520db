import fs from 'node:fs';
import path from 'node:path';

export const DEFAULT_ENV_FILES = ['.env.local', '.env'];

/** Only relay settings are taken from env files; a shared `.env` may hold anything. */
export const RELAY_ENV_KEY = /^(REASONING|ANSWER|RELAY)_[A-Z0-9_]+$/;

export type EnvRecord = Record<string, string | undefined>;

export type EnvFileResult = {
  path: string;
  loaded: boolean;
  /** Keys this file set, in file order. */
  applied: string[];
};

type ParsedEntry = {
  key: string;
  value: string;
};

function unquote(value: string): string {
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseEnvLine(line: string): ParsedEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  const separator = trimmed.indexOf('=');
  if (separator <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separator).trim().replace(/^export\s+/, '');
  return key ? { key, value: unquote(trimmed.slice(separator + 1).trim()) } : null;
}

/**
 * Fills unset relay settings in `env` from env files. Values already in `env`
 * win, and so does an earlier file over a later one.
 */
export function loadRelayEnv(
  options: { files?: string[]; cwd?: string; env?: EnvRecord } = {}
): EnvFileResult[] {
  const files = options.files?.length ? options.files : DEFAULT_ENV_FILES;
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  return files.map((relativePath) => {
    const filePath = path.resolve(cwd, relativePath);
    if (!fs.existsSync(filePath)) {
      return { path: relativePath, loaded: false, applied: [] };
    }

    const applied: string[] = [];
    for (const line of fs.readFileSync(filePath, 'utf-8').split(/\r?\n/)) {
      const entry = parseEnvLine(line);
      if (!entry || !RELAY_ENV_KEY.test(entry.key) || env[entry.key] !== undefined) {
        continue;
      }
      env[entry.key] = entry.value;
      applied.push(entry.key);
    }
    return { path: relativePath, loaded: true, applied };
  });
}
