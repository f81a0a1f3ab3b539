import { join, resolve } from 'node:path';

import { loadConfig } from '../core/config.js';
import {
  createExecutionPlan,
  formatPlan,
  generatePlanSteps,
  savePlan,
  writePlanFile,
} from '../core/planner.js';
import { resolveStudentInfo } from '../core/student.js';
import { logger } from '../ui/logger.js';
import { getRemoteUrl } from '../utils/git.js';

export interface PlanOptions {
  repoPath: string;
  output?: string;
  save?: boolean;
}

export async function planCommand(options: PlanOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath);
  const config = await loadConfig(repoRoot);

  const steps = await generatePlanSteps(repoRoot, config.requiredPaths);
  console.log(formatPlan(steps));

  if (!options.output && !options.save) return;

  const repoUrl = (await getRemoteUrl(repoRoot, config.remote)) ?? '';
  const plan = await createExecutionPlan(repoRoot, resolveStudentInfo({ repoUrl }), config);
  console.log();

  if (options.output) {
    const outputPath = resolve(options.output);
    await writePlanFile(plan, outputPath);
    logger.success(`Plan written to ${outputPath}`);
  }

  if (options.save) {
    const saved = await savePlan(plan, join(repoRoot, config.logsDir));
    logger.success(`Plan saved to ${saved}`);
  }
}
