import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: 'dots' });
}

/**
 * Runs `fn` under a spinner. `isFailure` lets callers that never throw (the
 * executor reports failures as values) still end on a red cross.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  isFailure?: (result: T) => boolean,
): Promise<T> {
  const spinner = createSpinner(text);
  spinner.start();
  try {
    const result = await fn();
    if (isFailure?.(result)) {
      spinner.fail();
    } else {
      spinner.succeed();
    }
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
