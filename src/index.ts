#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { UserCancelledError } from './utils/errors.js';

function isPromptExit(error: unknown): boolean {
  // @inquirer/prompts rejects with ExitPromptError on Ctrl+C
  return error instanceof Error && error.name === 'ExitPromptError';
}

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof UserCancelledError || isPromptExit(error)) {
    logger.warn('Cancelled.');
    process.exitCode = 130;
    return;
  }

  logger.error(error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exitCode = 1;
});
