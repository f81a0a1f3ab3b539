import { resolve } from 'node:path';

import { loadConfig } from '../core/config.js';
import { Executor } from '../core/executor.js';
import { resolveStudentInfo } from '../core/student.js';
import type { StudentInfo } from '../core/types.js';
import { logger } from '../ui/logger.js';
import { printFileSummary } from '../ui/report.js';
import { getRemoteUrl } from '../utils/git.js';

export interface DocumentOptions {
  repoPath: string;
  name?: string;
  university?: string;
  department?: string;
  repoUrl?: string;
}

export interface ReadmeOptions extends DocumentOptions {
  contact?: string;
  howToRun?: string;
}

export interface EmailOptions extends DocumentOptions {
  to?: string[];
  output?: string;
}

async function studentFor(repoRoot: string, remote: string, options: DocumentOptions): Promise<StudentInfo> {
  const repoUrl = options.repoUrl ?? (await getRemoteUrl(repoRoot, remote)) ?? undefined;
  return resolveStudentInfo({
    name: options.name,
    university: options.university,
    department: options.department,
    repoUrl,
  });
}

export async function readmeCommand(options: ReadmeOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath);
  const config = await loadConfig(repoRoot);
  const executor = new Executor(repoRoot, { config });
  const student = await studentFor(repoRoot, config.remote, options);

  const result = await executor.generateReadme(student, {
    contactEmail: options.contact,
    howToRun: options.howToRun,
  });

  if (!result.success) {
    logger.error(result.message);
    process.exitCode = 1;
    return;
  }

  printFileSummary(executor.fileWriter, repoRoot);
  if (result.details && 'checks' in result.details && result.details.checks) {
    const failedChecks = Object.entries(result.details.checks)
      .filter(([, ok]) => !ok)
      .map(([check]) => check);
    if (failedChecks.length > 0) {
      logger.warn(`README self-check failed: ${failedChecks.join(', ')}`);
    }
  }
  logger.success(result.message);
}

export async function emailCommand(options: EmailOptions): Promise<void> {
  const repoRoot = resolve(options.repoPath);
  const config = await loadConfig(repoRoot);
  const executor = new Executor(repoRoot, { config });
  const student = await studentFor(repoRoot, config.remote, options);

  const result = await executor.createEmailDraft(student, {
    recipients: options.to,
    outPath: options.output,
  });

  if (!result.success) {
    logger.error(result.message);
    process.exitCode = 1;
    return;
  }

  printFileSummary(executor.fileWriter, repoRoot);
  logger.success(result.message);
}
