import { join } from 'node:path';

import { logger } from '../ui/logger.js';
import { errorMessage } from '../utils/errors.js';
import { fileExists, isDirectoryPath, readFileIfExists, resolveInside } from '../utils/fs.js';
import type { HandinConfig } from './config.js';
import { defaultConfig } from './config.js';
import { generateEmailDraft } from './email-generator.js';
import type { ExecutionResults } from './execution-log.js';
import { resultKey } from './execution-log.js';
import { FileWriter } from './file-writer.js';
import type { ExecutionPlan, PlanEntry, ReadmeParameters } from './plan.js';
import { findOrderingViolations } from './plan.js';
import { generateReadme, validateReadme } from './readme-generator.js';
import { runTestCommand } from './test-runner.js';
import type { TestCommandRunner } from './test-runner.js';
import type { ExecutionResult, StudentInfo } from './types.js';
import { failed, succeeded } from './types.js';
import { createVersionControl } from './vcs/index.js';
import type { VersionControl } from './vcs/index.js';

export const GITKEEP = '.gitkeep';

/** Sections a submission README must carry, checked case-insensitively. */
export const README_PATTERNS: readonly RegExp[] = [
  /Title|^# /i,
  /Student|Name/i,
  /University/i,
  /Department/i,
  /Deliverables/i,
  /How to run|Installation/i,
  /Contact/i,
];

export interface ExecutorOptions {
  config?: HandinConfig;
  vcs?: VersionControl;
  testRunner?: TestCommandRunner;
  fileWriter?: FileWriter;
}

export interface EmailDraftOptions {
  recipients?: readonly string[];
  outPath?: string;
}

/**
 * Performs plan actions against one repository. Every public operation
 * resolves to an ExecutionResult; failures are reported, never thrown.
 */
export class Executor {
  readonly repoRoot: string;
  readonly config: HandinConfig;
  readonly fileWriter: FileWriter;
  private readonly testRunner: TestCommandRunner;
  private vcsClient: VersionControl | undefined;

  constructor(repoRoot: string, options: ExecutorOptions = {}) {
    this.repoRoot = repoRoot;
    this.config = options.config ?? defaultConfig();
    this.vcsClient = options.vcs;
    this.testRunner = options.testRunner ?? runTestCommand;
    this.fileWriter = options.fileWriter ?? new FileWriter();
  }

  // Created on first use: simple-git refuses a directory that does not exist yet
  private get vcs(): VersionControl {
    this.vcsClient ??= createVersionControl(this.config.vcs, this.repoRoot);
    return this.vcsClient;
  }

  // ---------- Filesystem ----------

  async createPlaceholders(paths: readonly string[]): Promise<ExecutionResult> {
    const created: string[] = [];

    for (const path of paths) {
      try {
        const target = resolveInside(this.repoRoot, path);
        if (!target) {
          throw new Error('path escapes repository root');
        }
        if (isDirectoryPath(path)) {
          // The marker only goes into a directory this call created
          if (await this.fileWriter.ensureDir(target)) {
            await this.fileWriter.createIfMissing(join(target, GITKEEP));
            created.push(path);
          }
        } else if (await this.fileWriter.createIfMissing(target)) {
          created.push(path);
        }
      } catch (error) {
        return failed(`Failed creating ${path}: ${errorMessage(error)}`, { created });
      }
    }

    return succeeded('Placeholders ensured', { created });
  }

  // ---------- Validation ----------

  async validateRequired(paths: readonly string[] = this.config.requiredPaths): Promise<ExecutionResult> {
    const missing: string[] = [];

    for (const path of paths) {
      const target = resolveInside(this.repoRoot, path);
      if (!target) {
        return failed(`Path escapes repository root: ${path}`);
      }
      if (!(await fileExists(target))) {
        missing.push(path);
      }
    }

    return missing.length === 0
      ? succeeded('Validation complete', { missing })
      : failed(`Missing deliverables: ${missing.join(', ')}`, { missing });
  }

  async assertReadmeFields(readmePath = 'README.md'): Promise<ExecutionResult> {
    const target = resolveInside(this.repoRoot, readmePath);
    const content = target ? await readFileIfExists(target) : null;
    if (content === null) {
      return failed('README not found');
    }

    const missingPatterns = README_PATTERNS.filter((p) => !p.test(content)).map((p) => p.source);
    return missingPatterns.length === 0
      ? succeeded('README fields check', { missingPatterns })
      : failed(`README is missing sections: ${missingPatterns.join(', ')}`, { missingPatterns });
  }

  // ---------- Tests ----------

  async runTests(testPath = 'tests'): Promise<ExecutionResult> {
    const testDir = resolveInside(this.repoRoot, testPath);
    if (!testDir || !(await fileExists(testDir))) {
      return succeeded('No tests directory found; skipping');
    }

    try {
      const { exitCode, output } = await this.testRunner(this.config.testCommand, {
        cwd: this.repoRoot,
        timeoutMs: this.config.testTimeoutMs,
      });
      return exitCode === 0
        ? succeeded('Tests executed', { output })
        : failed(`Tests failed (exit code ${exitCode ?? 'none'})`, { output });
    } catch (error) {
      return failed(`Test run failed: ${errorMessage(error)}`);
    }
  }

  // ---------- Version control ----------

  async gitCommit(message = this.config.commitMessage): Promise<ExecutionResult> {
    try {
      await this.vcs.stageAll();
      if (!(await this.vcs.hasChanges())) {
        return succeeded('Nothing to commit', { committed: false });
      }
      await this.vcs.commit(message);
      return succeeded('Git commit complete', { committed: true });
    } catch (error) {
      return failed(`Git commit failed: ${errorMessage(error)}`);
    }
  }

  async gitPush(branch = this.config.branch, remote = this.config.remote): Promise<ExecutionResult> {
    try {
      await this.vcs.push(remote, branch);
      return succeeded('Git push complete', { remote, branch });
    } catch (error) {
      return failed(`Git push failed: ${errorMessage(error)}`);
    }
  }

  // ---------- Documents ----------

  async generateReadme(student: StudentInfo, params: ReadmeParameters = {}): Promise<ExecutionResult> {
    const readmePath = params.path ?? 'README.md';
    try {
      const target = resolveInside(this.repoRoot, readmePath);
      if (!target) {
        throw new Error(`path escapes repository root: ${readmePath}`);
      }
      const content = generateReadme({
        student,
        deliverables: params.deliverables ?? this.config.deliverables,
        howToRun: params.howToRun,
        contactEmail: params.contactEmail,
      });
      await this.fileWriter.write(target, content);
      return succeeded('README generated', { path: target, checks: validateReadme(content, student) });
    } catch (error) {
      return failed(`Failed to generate README: ${errorMessage(error)}`);
    }
  }

  async createEmailDraft(
    student: StudentInfo,
    options: EmailDraftOptions = {},
  ): Promise<ExecutionResult> {
    const outPath = options.outPath ?? this.config.emailPath;
    try {
      const target = resolveInside(this.repoRoot, outPath);
      if (!target) {
        throw new Error(`path escapes repository root: ${outPath}`);
      }
      const content = generateEmailDraft({
        student,
        recipients: options.recipients ?? this.config.recipients,
        deliverables: this.config.deliverables,
        subjectPrefix: this.config.subjectPrefix,
      });
      await this.fileWriter.write(target, content);
      return succeeded('Email draft created', { path: target });
    } catch (error) {
      return failed(`Failed to create email draft: ${errorMessage(error)}`);
    }
  }

  // ---------- Orchestration ----------

  /**
   * Runs every action once, in order. A failed action does not stop the walk,
   * and ordering problems are only warned about.
   */
  async executePlan(
    plan: ExecutionPlan,
    onResult?: (key: string, result: ExecutionResult) => void,
  ): Promise<ExecutionResults> {
    for (const violation of findOrderingViolations(plan.actions)) {
      logger.warn(`Plan order: ${violation}`);
    }

    const results: ExecutionResults = new Map();

    for (const [index, entry] of plan.actions.entries()) {
      const key = resultKey(index, entry);
      let result: ExecutionResult;
      try {
        result = await this.dispatch(entry, plan.student);
      } catch (error) {
        result = failed(`Action failed: ${errorMessage(error)}`);
      }
      logger.debug(`${key}: ${result.success ? 'ok' : 'failed'} - ${result.message}`);
      results.set(key, result);
      onResult?.(key, result);
    }

    return results;
  }

  private dispatch(entry: PlanEntry, student: StudentInfo): Promise<ExecutionResult> {
    switch (entry.type) {
      case 'create_missing_files':
        return this.createPlaceholders(entry.files);
      case 'validate_deliverables':
        return this.validateRequired(entry.files);
      case 'generate_readme':
        return this.generateReadme(student, entry.parameters);
      case 'check_readme':
        return this.assertReadmeFields(entry.parameters.path);
      case 'run_tests':
        return this.runTests(entry.parameters.testPath);
      case 'git_commit':
        return this.gitCommit(entry.parameters.message);
      case 'git_push':
        return this.gitPush(entry.parameters.branch, entry.parameters.remote);
      case 'generate_email':
        return this.createEmailDraft(student, entry.parameters);
      case 'rejected':
        return Promise.resolve(failed(entry.reason));
      default: {
        const _exhaustive: never = entry;
        throw new Error(`Unhandled plan entry: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
}
