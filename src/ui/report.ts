import { relative } from 'node:path';

import type { ExecutionResults } from '../core/execution-log.js';
import type { FileWriter } from '../core/file-writer.js';
import type { ExecutionResult } from '../core/types.js';
import { logger } from './logger.js';

export function printResult(key: string, result: ExecutionResult): void {
  const line = `${key}: ${result.message}`;
  if (result.success) {
    logger.success(line);
  } else {
    logger.error(line);
  }

  if (!result.details) return;
  if ('missing' in result.details && result.details.missing.length > 0) {
    logger.dim(`    missing: ${result.details.missing.join(', ')}`);
  } else if ('output' in result.details && !result.success) {
    const tail = result.details.output.trimEnd().split('\n').slice(-10);
    for (const outputLine of tail) logger.dim(`    ${outputLine}`);
  }
}

export function printSummary(results: ExecutionResults): number {
  const failures = [...results.values()].filter((r) => !r.success).length;
  console.log();
  if (failures === 0) {
    logger.success(`All ${results.size} actions succeeded`);
  } else {
    logger.warn(`${failures} of ${results.size} actions failed`);
  }
  return failures;
}

export function printFileSummary(writer: FileWriter, repoRoot: string): void {
  const { created, modified } = writer.getSummary();
  for (const path of created) logger.fileCreated(relative(repoRoot, path));
  for (const path of modified) logger.fileModified(relative(repoRoot, path));
}
