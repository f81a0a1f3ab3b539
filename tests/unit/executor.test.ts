import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { defaultConfig } from '../../src/core/config.js';
import { Executor } from '../../src/core/executor.js';
import { parsePlan } from '../../src/core/plan.js';
import type { TestCommandRunner } from '../../src/core/test-runner.js';
import type { StudentInfo } from '../../src/core/types.js';
import type { VersionControl } from '../../src/core/vcs/index.js';
import { logger } from '../../src/ui/logger.js';
import { GitCommandError, TestRunError } from '../../src/utils/errors.js';
import { fileExists } from '../../src/utils/fs.js';

const STUDENT: StudentInfo = {
  name: 'Ada Lovelace',
  university: 'Analytical University',
  department: 'Mathematics',
  repoUrl: 'https://example.com/ada/submission.git',
};

const FULL_README = [
  '# Project',
  'Student: A',
  'University: U',
  'Department: D',
  'Deliverables',
  'How to run',
  'Contact',
];

function fakeVcs() {
  return {
    backend: 'cli',
    stageAll: vi.fn(async () => {}),
    hasChanges: vi.fn(async () => true),
    commit: vi.fn(async (_message: string) => {}),
    push: vi.fn(async (_remote: string, _branch: string) => {}),
  } satisfies VersionControl;
}

describe('Executor', () => {
  let repoDir: string;

  beforeEach(async () => {
    repoDir = await mkdtemp(join(tmpdir(), 'handin-executor-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(repoDir, { recursive: true, force: true });
  });

  describe('createPlaceholders', () => {
    it('should create empty files and directories with a .gitkeep', async () => {
      const executor = new Executor(repoDir);

      const result = await executor.createPlaceholders(['README.md', 'src/', 'docs/architecture.md']);

      expect(result).toEqual({
        success: true,
        message: 'Placeholders ensured',
        details: { created: ['README.md', 'src/', 'docs/architecture.md'] },
      });
      expect(await readFile(join(repoDir, 'README.md'), 'utf-8')).toBe('');
      expect(await fileExists(join(repoDir, 'src', '.gitkeep'))).toBe(true);
      expect(await readFile(join(repoDir, 'docs', 'architecture.md'), 'utf-8')).toBe('');
    });

    it('should leave existing content alone and report nothing on a second run', async () => {
      await writeFile(join(repoDir, 'README.md'), '# Mine\n');
      const executor = new Executor(repoDir);

      await executor.createPlaceholders(['README.md', 'src/']);
      const second = await executor.createPlaceholders(['README.md', 'src/']);

      expect(second.details).toEqual({ created: [] });
      expect(await readFile(join(repoDir, 'README.md'), 'utf-8')).toBe('# Mine\n');
    });

    it('should not mark a directory that already exists', async () => {
      await mkdir(join(repoDir, 'src'));
      await writeFile(join(repoDir, 'src', 'main.ts'), 'export {};\n');

      const result = await new Executor(repoDir).createPlaceholders(['src/']);

      expect(result).toEqual({ success: true, message: 'Placeholders ensured', details: { created: [] } });
      expect(await readdir(join(repoDir, 'src'))).toEqual(['main.ts']);
    });

    it('should accept names that merely start with two dots', async () => {
      const result = await new Executor(repoDir).createPlaceholders(['..notes.md']);

      expect(result).toEqual({
        success: true,
        message: 'Placeholders ensured',
        details: { created: ['..notes.md'] },
      });
      expect(await fileExists(join(repoDir, '..notes.md'))).toBe(true);
    });

    it('should stop at the first path it cannot create', async () => {
      await writeFile(join(repoDir, 'blocker'), 'a file, not a directory');
      const executor = new Executor(repoDir);

      const result = await executor.createPlaceholders(['blocker/inner.txt', 'other.txt']);

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Failed creating blocker\/inner\.txt: /);
      expect(result.details).toEqual({ created: [] });
      expect(await fileExists(join(repoDir, 'other.txt'))).toBe(false);
    });

    it('should refuse paths outside the repository', async () => {
      const result = await new Executor(repoDir).createPlaceholders(['../outside.txt']);

      expect(result).toEqual({
        success: false,
        message: 'Failed creating ../outside.txt: path escapes repository root',
        details: { created: [] },
      });
    });
  });

  describe('validateRequired', () => {
    it('should list every missing path', async () => {
      await writeFile(join(repoDir, 'README.md'), '');
      await mkdir(join(repoDir, 'src'));

      const result = await new Executor(repoDir).validateRequired([
        'README.md',
        'src/',
        'docs/report.pdf',
        'interaction_logs/',
      ]);

      expect(result).toEqual({
        success: false,
        message: 'Missing deliverables: docs/report.pdf, interaction_logs/',
        details: { missing: ['docs/report.pdf', 'interaction_logs/'] },
      });
    });

    it('should succeed when everything is present', async () => {
      await writeFile(join(repoDir, 'README.md'), '');

      const result = await new Executor(repoDir).validateRequired(['README.md']);

      expect(result).toEqual({
        success: true,
        message: 'Validation complete',
        details: { missing: [] },
      });
    });

    it('should default to the configured required paths', async () => {
      const config = defaultConfig({ requiredPaths: ['a.txt'] });

      const result = await new Executor(repoDir, { config }).validateRequired();

      expect(result.message).toBe('Missing deliverables: a.txt');
    });

    it('should reject paths outside the repository', async () => {
      const result = await new Executor(repoDir).validateRequired(['../secret']);
      expect(result).toEqual({ success: false, message: 'Path escapes repository root: ../secret' });
    });
  });

  describe('assertReadmeFields', () => {
    it('should fail when there is no README', async () => {
      const result = await new Executor(repoDir).assertReadmeFields();
      expect(result).toEqual({ success: false, message: 'README not found' });
    });

    it('should pass a README carrying every section', async () => {
      await writeFile(join(repoDir, 'README.md'), FULL_README.join('\n'));

      const result = await new Executor(repoDir).assertReadmeFields();

      expect(result).toEqual({
        success: true,
        message: 'README fields check',
        details: { missingPatterns: [] },
      });
    });

    it('should match sections case-insensitively', async () => {
      await writeFile(join(repoDir, 'README.md'), FULL_README.join('\n').toLowerCase());
      const result = await new Executor(repoDir).assertReadmeFields();
      expect(result.success).toBe(true);
    });

    it.each([
      ['# Project', 'Title|^# '],
      ['Student: A', 'Student|Name'],
      ['University: U', 'University'],
      ['Department: D', 'Department'],
      ['Deliverables', 'Deliverables'],
      ['How to run', 'How to run|Installation'],
      ['Contact', 'Contact'],
    ])('should report a README without "%s"', async (dropped, pattern) => {
      const content = FULL_README.filter((line) => line !== dropped).join('\n');
      await writeFile(join(repoDir, 'README.md'), content);

      const result = await new Executor(repoDir).assertReadmeFields();

      expect(result).toEqual({
        success: false,
        message: `README is missing sections: ${pattern}`,
        details: { missingPatterns: [pattern] },
      });
    });

    it('should accept Installation in place of How to run', async () => {
      const content = FULL_README.map((line) => (line === 'How to run' ? 'Installation' : line));
      await writeFile(join(repoDir, 'README.md'), content.join('\n'));

      const result = await new Executor(repoDir).assertReadmeFields();

      expect(result.success).toBe(true);
    });
  });

  describe('runTests', () => {
    it('should skip when there is no tests directory', async () => {
      const testRunner = vi.fn<TestCommandRunner>();

      const result = await new Executor(repoDir, { testRunner }).runTests();

      expect(result).toEqual({ success: true, message: 'No tests directory found; skipping' });
      expect(testRunner).not.toHaveBeenCalled();
    });

    it('should run the configured command with the configured timeout', async () => {
      await mkdir(join(repoDir, 'tests'));
      const testRunner = vi.fn<TestCommandRunner>().mockResolvedValue({ exitCode: 0, output: '4 passed' });

      const result = await new Executor(repoDir, { testRunner }).runTests();

      expect(result).toEqual({ success: true, message: 'Tests executed', details: { output: '4 passed' } });
      expect(testRunner).toHaveBeenCalledWith(['npm', 'test', '--silent'], {
        cwd: repoDir,
        timeoutMs: 600_000,
      });
    });

    it('should report a failing exit code with the output', async () => {
      await mkdir(join(repoDir, 'spec'));
      const testRunner = vi.fn<TestCommandRunner>().mockResolvedValue({ exitCode: 2, output: '1 failed' });

      const result = await new Executor(repoDir, { testRunner }).runTests('spec');

      expect(result).toEqual({
        success: false,
        message: 'Tests failed (exit code 2)',
        details: { output: '1 failed' },
      });
    });

    it('should report a process killed by a signal', async () => {
      await mkdir(join(repoDir, 'tests'));
      const testRunner = vi.fn<TestCommandRunner>().mockResolvedValue({ exitCode: null, output: '' });

      const result = await new Executor(repoDir, { testRunner }).runTests();

      expect(result.message).toBe('Tests failed (exit code none)');
    });

    it('should turn a timeout into a failed result', async () => {
      await mkdir(join(repoDir, 'tests'));
      const testRunner = vi
        .fn<TestCommandRunner>()
        .mockRejectedValue(new TestRunError('npm test timed out after 5ms'));

      const result = await new Executor(repoDir, { testRunner }).runTests();

      expect(result).toEqual({ success: false, message: 'Test run failed: npm test timed out after 5ms' });
    });
  });

  describe('gitCommit', () => {
    it('should stage everything and commit with the configured message', async () => {
      const vcs = fakeVcs();

      const result = await new Executor(repoDir, { vcs }).gitCommit();

      expect(result).toEqual({ success: true, message: 'Git commit complete', details: { committed: true } });
      expect(vcs.stageAll).toHaveBeenCalledTimes(1);
      expect(vcs.commit).toHaveBeenCalledWith('Auto: push deliverables');
    });

    it('should not commit a clean tree', async () => {
      const vcs = fakeVcs();
      vcs.hasChanges.mockResolvedValue(false);

      const result = await new Executor(repoDir, { vcs }).gitCommit('Custom');

      expect(result).toEqual({ success: true, message: 'Nothing to commit', details: { committed: false } });
      expect(vcs.commit).not.toHaveBeenCalled();
    });

    it('should report git errors', async () => {
      const vcs = fakeVcs();
      vcs.stageAll.mockRejectedValue(new GitCommandError(['add', '--all'], 'fatal: not a git repository'));

      const result = await new Executor(repoDir, { vcs }).gitCommit();

      expect(result).toEqual({
        success: false,
        message: 'Git commit failed: git add --all failed: fatal: not a git repository',
      });
    });
  });

  describe('gitPush', () => {
    it('should push the configured branch to the configured remote', async () => {
      const vcs = fakeVcs();

      const result = await new Executor(repoDir, { vcs }).gitPush();

      expect(vcs.push).toHaveBeenCalledWith('origin', 'main');
      expect(result).toEqual({
        success: true,
        message: 'Git push complete',
        details: { remote: 'origin', branch: 'main' },
      });
    });

    it('should report a rejected push', async () => {
      const vcs = fakeVcs();
      vcs.push.mockRejectedValue(new GitCommandError(['push', 'upstream', 'dev'], 'rejected'));

      const result = await new Executor(repoDir, { vcs }).gitPush('dev', 'upstream');

      expect(result).toEqual({
        success: false,
        message: 'Git push failed: git push upstream dev failed: rejected',
      });
    });
  });

  describe('generateReadme', () => {
    it('should write the README over a placeholder and self-check it', async () => {
      await writeFile(join(repoDir, 'README.md'), '');
      const executor = new Executor(repoDir);

      const result = await executor.generateReadme(STUDENT, { deliverables: ['Code'] });

      expect(result).toEqual({
        success: true,
        message: 'README generated',
        details: {
          path: join(repoDir, 'README.md'),
          checks: {
            hasStudentName: true,
            hasUniversity: true,
            hasDepartment: true,
            hasDeliverablesSection: true,
            hasHowToRun: true,
            hasContact: true,
          },
        },
      });
      const content = await readFile(join(repoDir, 'README.md'), 'utf-8');
      expect(content).toContain('- Code\n');
      expect(content).toContain('https://example.com/ada/submission.git');
      expect(executor.fileWriter.getModifiedFiles()).toEqual([join(repoDir, 'README.md')]);
      expect((await executor.assertReadmeFields()).success).toBe(true);
    });

    it('should honour a custom path', async () => {
      const result = await new Executor(repoDir).generateReadme(STUDENT, { path: 'docs/README.md' });

      expect(result.success).toBe(true);
      expect(await fileExists(join(repoDir, 'docs', 'README.md'))).toBe(true);
    });

    it('should refuse a path outside the repository', async () => {
      const result = await new Executor(repoDir).generateReadme(STUDENT, { path: '../README.md' });

      expect(result).toEqual({
        success: false,
        message: 'Failed to generate README: path escapes repository root: ../README.md',
      });
    });
  });

  describe('createEmailDraft', () => {
    it('should write the draft to the configured path', async () => {
      const result = await new Executor(repoDir).createEmailDraft(STUDENT, {
        recipients: ['ta@example.com', 'prof@example.com'],
      });

      const path = join(repoDir, 'email_draft.txt');
      expect(result).toEqual({ success: true, message: 'Email draft created', details: { path } });
      const content = await readFile(path, 'utf-8');
      expect(content.split('\n')[0]).toBe('To: ta@example.com, prof@example.com');
      expect(content.split('\n')[1]).toBe(
        'Subject: Assignment Submission - Deliverables submitted (Ada Lovelace)',
      );
    });

    it('should report a path it cannot write', async () => {
      await mkdir(join(repoDir, 'email_draft.txt'));

      const result = await new Executor(repoDir).createEmailDraft(STUDENT);

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Failed to create email draft: /);
    });
  });

  describe('executePlan', () => {
    it('should run every action in order and report unknown ones', async () => {
      const plan = parsePlan({
        student_name: 'Ada Lovelace',
        actions: [
          { type: 'validate_deliverables', files: ['README.md'] },
          { type: 'deploy' },
          { type: 'run_tests' },
        ],
      });
      const seen: string[] = [];

      const results = await new Executor(repoDir).executePlan(plan, (key) => seen.push(key));

      expect([...results.keys()]).toEqual(['01_validate_deliverables', '02_deploy', '03_run_tests']);
      expect(seen).toEqual([...results.keys()]);
      expect(results.get('01_validate_deliverables')?.message).toBe('Missing deliverables: README.md');
      expect(results.get('02_deploy')).toEqual({ success: false, message: 'Unknown action: deploy' });
      expect(results.get('03_run_tests')?.success).toBe(true);
    });

    it('should carry the plan student into generated documents', async () => {
      const plan = parsePlan({
        student_name: 'Grace Hopper',
        university: 'Navy U',
        department: 'Compilers',
        actions: [{ type: 'generate_readme' }, { type: 'check_readme' }, { type: 'generate_email' }],
      });

      const results = await new Executor(repoDir).executePlan(plan);

      expect([...results.values()].every((r) => r.success)).toBe(true);
      const email = await readFile(join(repoDir, 'email_draft.txt'), 'utf-8');
      expect(email).toContain('Student: Grace Hopper\nUniversity: Navy U\nDepartment: Compilers\n');
    });

    it('should warn about publication steps that come before preparation', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
      const vcs = fakeVcs();
      const plan = parsePlan({ actions: [{ type: 'git_commit' }, { type: 'generate_readme' }] });

      const results = await new Executor(repoDir, { vcs }).executePlan(plan);

      expect(warn).toHaveBeenCalledWith('Plan order: git_commit (step 1) runs before generate_readme');
      expect(results.size).toBe(2);
      expect(vcs.commit).toHaveBeenCalledTimes(1);
    });
  });
});
