import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { PlanEntry } from './plan.js';
import { entryLabel } from './plan.js';
import type { ExecutionDetails, ExecutionResult } from './types.js';

export type ExecutionResults = Map<string, ExecutionResult>;

export interface LoggedResult {
  success: boolean;
  message: string;
  details: ExecutionDetails | null;
}

/** `"03_run_tests"` for the third action. */
export function resultKey(index: number, entry: PlanEntry): string {
  return `${String(index + 1).padStart(2, '0')}_${entryLabel(entry)}`;
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function serializeResults(results: ExecutionResults): Record<string, LoggedResult> {
  const out: Record<string, LoggedResult> = {};
  for (const [key, result] of results) {
    out[key] = {
      success: result.success,
      message: result.message,
      details: result.details ?? null,
    };
  }
  return out;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Writes `<prefix>_<timestamp>.json` into `dir` without ever replacing an
 * existing file: a second write in the same second gets a `_1`, `_2`… suffix.
 */
export async function writeTimestampedJson(
  dir: string,
  prefix: string,
  data: unknown,
  now = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const base = `${prefix}_${formatTimestamp(now)}`;
  const body = JSON.stringify(data, null, 2) + '\n';

  for (let attempt = 0; ; attempt++) {
    const path = join(dir, attempt === 0 ? `${base}.json` : `${base}_${attempt}.json`);
    try {
      await writeFile(path, body, { encoding: 'utf-8', flag: 'wx' });
      return path;
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
    }
  }
}

export async function writeExecutionLog(
  results: ExecutionResults,
  logsDir: string,
  now = new Date(),
): Promise<string> {
  return writeTimestampedJson(logsDir, 'execution', serializeResults(results), now);
}
