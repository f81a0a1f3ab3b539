import { hasUncommittedChanges, runGit } from '../../utils/git.js';
import type { VcsBackend, VersionControl } from './types.js';

export class GitCliClient implements VersionControl {
  readonly backend: VcsBackend = 'cli';

  constructor(private readonly cwd: string) {}

  async stageAll(): Promise<void> {
    await runGit(['add', '--all'], this.cwd);
  }

  hasChanges(): Promise<boolean> {
    return hasUncommittedChanges(this.cwd);
  }

  async commit(message: string): Promise<void> {
    await runGit(['commit', '-m', message], this.cwd);
  }

  async push(remote: string, branch: string): Promise<void> {
    await runGit(['push', remote, branch], this.cwd);
  }
}
