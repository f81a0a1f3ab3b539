export type VcsBackend = 'cli' | 'simple-git';

export interface VersionControl {
  readonly backend: VcsBackend;
  /** `git add --all` */
  stageAll(): Promise<void>;
  /** True when anything is staged, modified or untracked. */
  hasChanges(): Promise<boolean>;
  commit(message: string): Promise<void>;
  push(remote: string, branch: string): Promise<void>;
}
