import { resolve } from 'node:path';

import { loadConfig } from '../core/config.js';
import { Executor } from '../core/executor.js';
import { logger } from '../ui/logger.js';
import { printResult } from '../ui/report.js';

export interface CheckOptions {
  repoPath: string;
}

export async function checkCommand(options: CheckOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath);
  const config = await loadConfig(repoRoot);
  const executor = new Executor(repoRoot, { config });

  logger.header('Checking deliverables');

  const required = await executor.validateRequired();
  printResult('deliverables', required);

  const readme = await executor.assertReadmeFields();
  printResult('readme', readme);
  if (readme.details && 'missingPatterns' in readme.details) {
    for (const pattern of readme.details.missingPatterns) {
      logger.dim(`    no match for /${pattern}/i`);
    }
  }

  if (!required.success || !readme.success) {
    process.exitCode = 1;
  }
}
