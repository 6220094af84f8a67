import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent, so the worker and the
 * API server pick up the same keys wherever they are started from.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [path.join(cwd, '.env'), path.join(cwd, '..', '.env')];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    const result = dotenv.config({ path: envPath });
    if (result.error && process.env.NODE_ENV === 'development') {
      console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
    }
    return;
  }
}

/** Read a string variable; empty strings count as unset. */
export function envString(name: string, fallback = ''): string {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : fallback;
}

/** Read a numeric variable, falling back when unset or not a finite number. */
export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}
