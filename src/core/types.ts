export interface StudentInfo {
  readonly name: string;
  readonly university: string;
  readonly department: string;
  readonly repoUrl: string;
}

export type ReadmeCheck =
  | 'hasStudentName'
  | 'hasUniversity'
  | 'hasDepartment'
  | 'hasDeliverablesSection'
  | 'hasHowToRun'
  | 'hasContact';

export type ReadmeChecks = Record<ReadmeCheck, boolean>;

/** One shape per kind of action outcome. */
export type ExecutionDetails =
  | { readonly created: readonly string[] }
  | { readonly missing: readonly string[] }
  | { readonly missingPatterns: readonly string[] }
  | { readonly output: string }
  | { readonly path: string; readonly checks?: ReadmeChecks }
  | { readonly committed: boolean }
  | { readonly remote: string; readonly branch: string };

export interface ExecutionResult {
  readonly success: boolean;
  readonly message: string;
  readonly details?: ExecutionDetails;
}

export function succeeded(message: string, details?: ExecutionDetails): ExecutionResult {
  return Object.freeze(details ? { success: true, message, details } : { success: true, message });
}

export function failed(message: string, details?: ExecutionDetails): ExecutionResult {
  return Object.freeze(details ? { success: false, message, details } : { success: false, message });
}
