import fs from 'fs';
import path from 'path';
import { logger } from './logger';

const loadedFiles = new Set<string>();

/** Parses one `KEY=value` line; `export ` prefixes and matching quotes are dropped. */
export function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim().replace(/^export\s+/, '');
  if (!trimmed || trimmed.startsWith('#')) return null;

  const separator = trimmed.indexOf('=');
  if (separator <= 0) return null;

  const key = trimmed.slice(0, separator).trim();
  let value = trimmed.slice(separator + 1).trim();
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    value = value.slice(1, -1);
  }
  return [key, value];
}

/**
 * Copies settings from a `.env` file into `process.env` once per file.
 * Variables already set in the environment win. Returns the keys it applied.
 */
export function loadEnv(envFile = path.resolve(process.cwd(), '.env')): string[] {
  if (loadedFiles.has(envFile) || !fs.existsSync(envFile)) {
    return [];
  }
  loadedFiles.add(envFile);

  const applied: string[] = [];
  for (const line of fs.readFileSync(envFile, 'utf-8').split(/\r?\n/)) {
    const entry = parseEnvLine(line);
    if (!entry || entry[0] in process.env) continue;
    process.env[entry[0]] = entry[1];
    applied.push(entry[0]);
  }

  logger.info('Link inspector settings loaded from .env', { file: envFile, keys: applied.length });
  return applied;
}
