import { exec, execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { GitCommandError } from './errors.js';

const execAsync = promisify(exec);
const execFileAsync = promisify(execFile);

export async function isGitRepo(dir?: string): Promise<boolean> {
  try {
    await execAsync('git rev-parse --is-inside-work-tree', { cwd: dir });
    return true;
  } catch {
    return false;
  }
}

export async function getRemoteUrl(dir?: string, remote = 'origin'): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('git', ['remote', 'get-url', remote], { cwd: dir });
    return stdout.trim() || null;
  } catch {
    return null;
  }
}

export async function hasUncommittedChanges(dir?: string): Promise<boolean> {
  const { stdout } = await runGit(['status', '--porcelain'], dir);
  return stdout.trim().length > 0;
}

function stderrOf(error: unknown): string | null {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim() || null;
  }
  return null;
}

/**
 * Runs git with an argument vector (no shell), so commit messages and branch
 * names never need quoting. Failures surface as GitCommandError carrying
 * git's own stderr when there is any.
 */
export async function runGit(
  args: readonly string[],
  cwd?: string,
): Promise<{ stdout: string; stderr: string }> {
  try {
    return await execFileAsync('git', [...args], { cwd, encoding: 'utf-8' });
  } catch (error) {
    const detail = stderrOf(error) ?? (error instanceof Error ? error.message : String(error));
    throw new GitCommandError(args, detail);
  }
}
