import { GitCliClient } from './git-cli.js';
import { SimpleGitClient } from './simple-git.js';
import type { VcsBackend, VersionControl } from './types.js';

export function createVersionControl(backend: VcsBackend, cwd: string): VersionControl {
  switch (backend) {
    case 'cli':
      return new GitCliClient(cwd);
    case 'simple-git':
      return new SimpleGitClient(cwd);
    default: {
      const _exhaustive: never = backend;
      throw new Error(`Unknown version control backend: ${_exhaustive}`);
    }
  }
}

export { GitCliClient } from './git-cli.js';
export { SimpleGitClient } from './simple-git.js';
export type { VcsBackend, VersionControl } from './types.js';
