import type { StudentInfo } from './types.js';

export interface StudentInfoOverrides {
  name?: string;
  university?: string;
  department?: string;
  repoUrl?: string;
}

/**
 * Explicit values win over STUDENT_NAME / UNIVERSITY / DEPARTMENT from the
 * environment; anything still unset becomes an empty string.
 */
export function resolveStudentInfo(
  overrides: StudentInfoOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): StudentInfo {
  return Object.freeze({
    name: overrides.name ?? env.STUDENT_NAME ?? '',
    university: overrides.university ?? env.UNIVERSITY ?? '',
    department: overrides.department ?? env.DEPARTMENT ?? '',
    repoUrl: overrides.repoUrl ?? '',
  });
}
