import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

import { fileExists } from '../utils/fs.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_SUBJECT_PREFIX } from './email-generator.js';

export const CONFIG_FILENAMES = ['handin.config.yaml', 'handin.config.yml', 'handin.config.json'];

export const DEFAULT_REQUIRED_PATHS = [
  'README.md',
  'src/',
  'docs/architecture.md',
  'docs/report.pdf',
  'interaction_logs/',
];

export const DEFAULT_DELIVERABLES = [
  'Source code of the prototype (`src/`)',
  'Architecture document (`docs/architecture.md`)',
  'Project report (`docs/report.pdf`)',
  'Interaction logs (`interaction_logs/`)',
  'Optional demo video or screenshots',
];

export const DEFAULT_TEST_TIMEOUT_MS = 600_000;

export const handinConfigSchema = z.object({
  requiredPaths: z.array(z.string().min(1)).default(() => [...DEFAULT_REQUIRED_PATHS]),
  deliverables: z.array(z.string()).default(() => [...DEFAULT_DELIVERABLES]),
  logsDir: z.string().min(1).default('interaction_logs/'),
  testCommand: z.array(z.string().min(1)).nonempty().default((): [string, ...string[]] => ['npm', 'test', '--silent']),
  testTimeoutMs: z.number().int().positive().default(DEFAULT_TEST_TIMEOUT_MS),
  vcs: z.enum(['cli', 'simple-git']).default('cli'),
  remote: z.string().min(1).default('origin'),
  branch: z.string().min(1).default('main'),
  commitMessage: z.string().min(1).default('Auto: push deliverables'),
  recipients: z.array(z.string()).default(() => []),
  emailPath: z.string().min(1).default('email_draft.txt'),
  subjectPrefix: z.string().default(DEFAULT_SUBJECT_PREFIX),
});

export type HandinConfig = z.output<typeof handinConfigSchema>;
export type HandinConfigInput = z.input<typeof handinConfigSchema>;

export function defaultConfig(overrides: HandinConfigInput = {}): HandinConfig {
  return handinConfigSchema.parse(overrides);
}

export async function findConfigFile(repoRoot: string): Promise<string | null> {
  for (const name of CONFIG_FILENAMES) {
    const candidate = join(repoRoot, name);
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

/**
 * Loads handin.config.{yaml,yml,json} from the repository root. JSON goes
 * through the YAML parser too. No file means defaults; an unreadable or
 * invalid file is a ConfigError.
 */
export async function loadConfig(repoRoot: string): Promise<HandinConfig> {
  const configPath = await findConfigFile(repoRoot);
  if (!configPath) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configPath, errorMessage(error));
  }

  // An empty file parses to null
  const result = handinConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(configPath, `${where}${issue.message}`);
  }
  return result.data;
}
