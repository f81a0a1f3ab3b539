import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { PlanFileError, errorMessage } from '../utils/errors.js';
import type { StudentInfo } from './types.js';

const filesField = z.array(z.string());

export const readmeParametersSchema = z.object({
  deliverables: z.array(z.string()).optional(),
  howToRun: z.string().optional(),
  contactEmail: z.string().optional(),
  path: z.string().min(1).optional(),
});

export const planActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('create_missing_files'), files: filesField.default(() => []) }),
  z.object({ type: z.literal('validate_deliverables'), files: filesField.optional() }),
  z.object({ type: z.literal('generate_readme'), parameters: readmeParametersSchema.default({}) }),
  z.object({
    type: z.literal('check_readme'),
    parameters: z.object({ path: z.string().min(1).optional() }).default({}),
  }),
  z.object({
    type: z.literal('run_tests'),
    parameters: z.object({ testPath: z.string().min(1).optional() }).default({}),
  }),
  z.object({
    type: z.literal('git_commit'),
    parameters: z.object({ message: z.string().min(1).optional() }).default({}),
  }),
  z.object({
    type: z.literal('git_push'),
    parameters: z
      .object({ branch: z.string().min(1).optional(), remote: z.string().min(1).optional() })
      .default({}),
  }),
  z.object({
    type: z.literal('generate_email'),
    parameters: z
      .object({ recipients: z.array(z.string()).optional(), outPath: z.string().min(1).optional() })
      .default({}),
  }),
]);

export type PlanAction = z.output<typeof planActionSchema>;
export type ActionType = PlanAction['type'];
export type ReadmeParameters = z.output<typeof readmeParametersSchema>;

export const ACTION_TYPES: readonly ActionType[] = [
  'create_missing_files',
  'validate_deliverables',
  'generate_readme',
  'check_readme',
  'run_tests',
  'git_commit',
  'git_push',
  'generate_email',
];

/**
 * An action from a plan file that could not be understood. It stays in the
 * plan so the executor can report it in sequence.
 */
export interface RejectedAction {
  type: 'rejected';
  declaredType: string;
  reason: string;
}

export type PlanEntry = PlanAction | RejectedAction;

export interface ExecutionPlan {
  student: StudentInfo;
  actions: PlanEntry[];
}

const planFileSchema = z.object({
  actions: z.array(z.unknown()).default(() => []),
  student_name: z.string().default(''),
  university: z.string().default(''),
  department: z.string().default(''),
  repo_url: z.string().default(''),
});

export type PlanFile = z.input<typeof planFileSchema>;

function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

/** The `type` field as written, stringified when it is not a string. */
function declaredTypeOf(raw: unknown): string | null {
  const envelope = z.object({ type: z.unknown() }).safeParse(raw);
  if (!envelope.success) return null;
  const { type } = envelope.data;
  return type === undefined || type === null ? null : String(type);
}

export function parseAction(raw: unknown): PlanEntry {
  const declaredType = declaredTypeOf(raw);
  if (declaredType === null) {
    return { type: 'rejected', declaredType: 'unknown', reason: 'Unknown action: <missing type>' };
  }

  if (!isActionType(declaredType)) {
    return { type: 'rejected', declaredType, reason: `Unknown action: ${declaredType}` };
  }

  const parsed = planActionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      type: 'rejected',
      declaredType,
      reason: `Invalid ${declaredType} action: ${issue.path.join('.')} ${issue.message}`.trim(),
    };
  }
  return parsed.data;
}

export function parsePlan(raw: unknown, source = '<plan>'): ExecutionPlan {
  const result = planFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new PlanFileError(source, `${where}${issue.message}`);
  }

  const file = result.data;
  return {
    student: {
      name: file.student_name,
      university: file.university,
      department: file.department,
      repoUrl: file.repo_url,
    },
    actions: file.actions.map(parseAction),
  };
}

export async function readPlanFile(planPath: string): Promise<ExecutionPlan> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(planPath, 'utf-8'));
  } catch (error) {
    throw new PlanFileError(planPath, errorMessage(error));
  }
  return parsePlan(raw, planPath);
}

/** Wire shape, as read by `parsePlan`. */
export function toPlanFile(plan: ExecutionPlan): PlanFile {
  return {
    actions: plan.actions.map((entry) =>
      entry.type === 'rejected' ? { type: entry.declaredType } : entry,
    ),
    student_name: plan.student.name,
    university: plan.student.university,
    department: plan.student.department,
    repo_url: plan.student.repoUrl,
  };
}

export function entryLabel(entry: PlanEntry): string {
  return entry.type === 'rejected' ? entry.declaredType : entry.type;
}

const PREPARATION: readonly ActionType[] = ['create_missing_files', 'generate_readme'];
const PUBLICATION: readonly ActionType[] = ['git_commit', 'git_push'];

/**
 * Lists places where a commit or push comes before placeholder creation or
 * README generation. Such plans still run; callers decide whether to warn.
 */
export function findOrderingViolations(actions: readonly PlanEntry[]): string[] {
  const violations: string[] = [];

  actions.forEach((entry, index) => {
    if (entry.type === 'rejected' || !PUBLICATION.includes(entry.type)) return;
    for (const later of actions.slice(index + 1)) {
      if (later.type !== 'rejected' && PREPARATION.includes(later.type)) {
        violations.push(`${entry.type} (step ${index + 1}) runs before ${later.type}`);
      }
    }
  });

  return violations;
}
