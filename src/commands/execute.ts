import { join, resolve } from 'node:path';

import { loadConfig } from '../core/config.js';
import { writeExecutionLog } from '../core/execution-log.js';
import { Executor } from '../core/executor.js';
import { readPlanFile } from '../core/plan.js';
import { logger } from '../ui/logger.js';
import { printFileSummary, printResult, printSummary } from '../ui/report.js';

export interface ExecuteOptions {
  repoPath: string;
  planPath: string;
}

export async function executeCommand(options: ExecuteOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath);
  const config = await loadConfig(repoRoot);
  const plan = await readPlanFile(resolve(options.planPath));

  logger.header(`Executing ${plan.actions.length} actions in ${repoRoot}`);

  const executor = new Executor(repoRoot, { config });
  const results = await executor.executePlan(plan, printResult);

  printFileSummary(executor.fileWriter, repoRoot);
  const failures = printSummary(results);

  const logPath = await writeExecutionLog(results, join(repoRoot, config.logsDir));
  logger.info(`Execution complete. Results saved to: ${logPath}`);

  if (failures > 0) {
    process.exitCode = 1;
  }
}
