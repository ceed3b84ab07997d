/**
 * Environment helpers used by each server's config loader
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Whole numbers only (ports, limits, counts); unparsable values fall back to the default
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}
