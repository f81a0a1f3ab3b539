export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export class NotAGitRepoError extends Error {
  constructor(message = 'Not a git repository. Please run this command from within a git repo.') {
    super(message);
    this.name = 'NotAGitRepoError';
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Invalid configuration in ${configPath}: ${reason}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export class PlanFileError extends Error {
  readonly planPath: string;

  constructor(planPath: string, reason: string) {
    super(`Cannot load plan ${planPath}: ${reason}`);
    this.name = 'PlanFileError';
    this.planPath = planPath;
  }
}

export class GitCommandError extends Error {
  readonly args: readonly string[];

  constructor(args: readonly string[], detail: string) {
    super(`git ${args.join(' ')} failed: ${detail}`);
    this.name = 'GitCommandError';
    this.args = args;
  }
}

export class TestRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TestRunError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
