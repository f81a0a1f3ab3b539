import { writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { fileExists } from '../utils/fs.js';
import type { HandinConfig } from './config.js';
import { toPlanFile } from './plan.js';
import type { ExecutionPlan, PlanAction } from './plan.js';
import { writeTimestampedJson } from './execution-log.js';
import type { StudentInfo } from './types.js';

export interface DeliverableStatus {
  existing: string[];
  missing: string[];
}

/**
 * Splits the required paths into those present under `repoRoot` and those
 * absent. Paths that cannot be accessed count as missing; input order is kept.
 */
export async function analyzeDeliverables(
  repoRoot: string,
  requiredPaths: readonly string[],
): Promise<DeliverableStatus> {
  const existing: string[] = [];
  const missing: string[] = [];

  for (const path of requiredPaths) {
    if (await fileExists(join(repoRoot, path))) {
      existing.push(path);
    } else {
      missing.push(path);
    }
  }

  return { existing, missing };
}

export async function generatePlanSteps(
  repoRoot: string,
  requiredPaths: readonly string[],
): Promise<string[]> {
  const status = await analyzeDeliverables(repoRoot, requiredPaths);

  const steps = ['Check repository structure', `Verify existing files: ${status.existing.join(', ')}`];

  if (status.missing.length > 0) {
    steps.push(`Create missing files/directories: ${status.missing.join(', ')}`);
  }

  steps.push(
    'Generate README.md with student info and deliverables',
    'Run validation tests',
    'Commit all changes to git',
    'Push to GitHub repository',
    'Generate email draft for submission',
  );

  return steps;
}

export function formatPlan(steps: readonly string[]): string {
  const lines = ['=== DELIVERABLES SUBMISSION PLAN ===', ...steps.map((step, i) => `${i + 1}. ${step}`)];
  return lines.join('\n');
}

export async function createExecutionPlan(
  repoRoot: string,
  student: StudentInfo,
  config: HandinConfig,
): Promise<ExecutionPlan> {
  const { missing } = await analyzeDeliverables(repoRoot, config.requiredPaths);

  const actions: PlanAction[] = [];
  if (missing.length > 0) {
    actions.push({ type: 'create_missing_files', files: missing });
  }
  actions.push(
    { type: 'generate_readme', parameters: { deliverables: [...config.deliverables] } },
    { type: 'run_tests', parameters: {} },
    { type: 'git_commit', parameters: { message: config.commitMessage } },
    { type: 'git_push', parameters: { branch: config.branch, remote: config.remote } },
    { type: 'generate_email', parameters: { recipients: [...config.recipients] } },
  );

  return { student, actions };
}

/** Writes `plan_<timestamp>.json` into `logsDir` for auditing. */
export async function savePlan(
  plan: ExecutionPlan,
  logsDir: string,
  now = new Date(),
): Promise<string> {
  return writeTimestampedJson(logsDir, 'plan', toPlanFile(plan), now);
}

export async function writePlanFile(plan: ExecutionPlan, outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(toPlanFile(plan), null, 2) + '\n', 'utf-8');
}
