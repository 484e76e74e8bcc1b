#!/usr/bin/env node

import { createProgram, defaultContext } from './cli.js';
import { INPUT_ERROR_CODES, isToolError } from './errors/ToolError.js';
import { validateConfig } from './utils/config.js';
import { logger } from './utils/logger.js';

function formatUnknownError(input: unknown): string {
  if (input instanceof Error) {
    return `${input.name}: ${input.message}`;
  }

  try {
    return typeof input === 'string' ? input : JSON.stringify(input);
  } catch {
    return String(input);
  }
}

async function main(): Promise<void> {
  const ctx = defaultContext();
  logger.setLevel(ctx.config.logLevel);
  logger.debug('Configuration loaded:', ctx.config);

  const validation = validateConfig(ctx.config);
  if (!validation.valid) {
    logger.error('Configuration validation failed:');
    validation.errors.forEach((error) => logger.error(`  - ${error}`));
    process.exitCode = 1;
    return;
  }

  await createProgram(ctx).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (isToolError(error)) {
    const kind = INPUT_ERROR_CODES.has(error.code) ? 'Invalid input' : 'Failed';
    logger.error(`${kind} [${error.code}] ${error.message}`);
    if (error.details) {
      logger.debug('Details:', error.details);
    }
  } else {
    logger.error(`Unexpected failure: ${formatUnknownError(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  }
  process.exitCode = 1;
});
