import { spawn } from 'node:child_process';

import { TestRunError } from '../utils/errors.js';

export interface TestRunOptions {
  cwd: string;
  timeoutMs: number;
}

export interface TestRunOutcome {
  exitCode: number | null;
  /** stdout and stderr, interleaved as they arrived. */
  output: string;
}

export type TestCommandRunner = (
  command: readonly [string, ...string[]],
  options: TestRunOptions,
) => Promise<TestRunOutcome>;

/**
 * Spawns the test command and collects its combined output. Rejects with
 * TestRunError when the process cannot be started or outlives `timeoutMs`
 * (it is killed first).
 */
export const runTestCommand: TestCommandRunner = (command, options) => {
  const [bin, ...args] = command;

  return new Promise<TestRunOutcome>((resolve, reject) => {
    const child = spawn(bin, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env },
    });

    let output = '';
    let settled = false;
    const collect = (chunk: Buffer) => {
      output += chunk.toString();
    };
    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill();
      reject(new TestRunError(`${command.join(' ')} timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    child.on('error', (error: Error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(new TestRunError(`${command.join(' ')} could not be started: ${error.message}`));
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, output });
    });
  });
};
