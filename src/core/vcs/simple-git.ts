import { simpleGit } from 'simple-git';
import type { SimpleGit } from 'simple-git';

import type { VcsBackend, VersionControl } from './types.js';

export class SimpleGitClient implements VersionControl {
  readonly backend: VcsBackend = 'simple-git';
  private readonly git: SimpleGit;

  constructor(cwd: string) {
    this.git = simpleGit(cwd);
  }

  async stageAll(): Promise<void> {
    await this.git.add(['--all']);
  }

  async hasChanges(): Promise<boolean> {
    const status = await this.git.status();
    return !status.isClean();
  }

  async commit(message: string): Promise<void> {
    await this.git.commit(message);
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.git.push(remote, branch);
  }
}
