import { join, resolve } from 'node:path';

import { loadConfig } from '../core/config.js';
import { writeExecutionLog } from '../core/execution-log.js';
import { Executor } from '../core/executor.js';
import type { ActionType, ExecutionPlan } from '../core/plan.js';
import { entryLabel } from '../core/plan.js';
import { createExecutionPlan, savePlan } from '../core/planner.js';
import { resolveStudentInfo } from '../core/student.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, inputPrompt, multiselectPrompt } from '../ui/prompts.js';
import { printFileSummary, printResult, printSummary } from '../ui/report.js';
import { withSpinner } from '../ui/spinner.js';
import { NotAGitRepoError, UserCancelledError } from '../utils/errors.js';
import { getRemoteUrl, isGitRepo } from '../utils/git.js';

export interface RunOptions {
  repoPath?: string;
}

type OptionalStep = Extract<ActionType, 'create_missing_files' | 'run_tests'>;

export function withoutActions(plan: ExecutionPlan, excluded: readonly ActionType[]): ExecutionPlan {
  return {
    student: plan.student,
    actions: plan.actions.filter((a) => a.type === 'rejected' || !excluded.includes(a.type)),
  };
}

export async function runCommand(options: RunOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath ?? process.cwd());

  // ── 1. Pre-flight ────────────────────────────────────────────────────
  if (!(await isGitRepo(repoRoot))) {
    throw new NotAGitRepoError();
  }
  const config = await loadConfig(repoRoot);

  logger.header('handin - Deliverables Submission');
  logger.dim('Plan, validate, push, and draft the submission email.');
  console.log();

  // ── 2. Student info ──────────────────────────────────────────────────
  const name = await inputPrompt('Name:', process.env.STUDENT_NAME, true);
  const university = await inputPrompt('University:', process.env.UNIVERSITY);
  const department = await inputPrompt('Department:', process.env.DEPARTMENT);
  const detectedUrl = await getRemoteUrl(repoRoot, config.remote);
  const repoUrl = await inputPrompt('Repository URL:', detectedUrl ?? undefined);

  const enabled = await multiselectPrompt<OptionalStep>('Options:', [
    { name: 'Create placeholders for missing files', value: 'create_missing_files', checked: true },
    { name: 'Run tests after generation', value: 'run_tests', checked: false },
  ]);
  const excluded = (['create_missing_files', 'run_tests'] as const).filter(
    (step) => !enabled.includes(step),
  );

  // ── 3. Plan ──────────────────────────────────────────────────────────
  const student = resolveStudentInfo({ name, university, department, repoUrl });
  const plan = withoutActions(await createExecutionPlan(repoRoot, student, config), excluded);

  logger.header('Plan');
  plan.actions.forEach((entry, i) => logger.step(i + 1, entryLabel(entry)));
  console.log();

  const planPath = await savePlan(plan, join(repoRoot, config.logsDir));
  logger.dim(`Plan saved to ${planPath}`);

  if (!(await confirmPrompt('Execute this plan?', true))) {
    throw new UserCancelledError();
  }

  // ── 4. Execute ───────────────────────────────────────────────────────
  const executor = new Executor(repoRoot, { config });
  const results = await withSpinner(
    `Executing ${plan.actions.length} actions...`,
    () => executor.executePlan(plan),
    (r) => [...r.values()].some((result) => !result.success),
  );

  for (const [key, result] of results) printResult(key, result);
  printFileSummary(executor.fileWriter, repoRoot);
  const failures = printSummary(results);

  const logPath = await writeExecutionLog(results, join(repoRoot, config.logsDir));
  logger.info(`Results saved to: ${logPath}`);

  if (failures > 0) {
    process.exitCode = 1;
  }
}
