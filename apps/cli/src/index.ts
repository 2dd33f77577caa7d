#!/usr/bin/env tsx
/**
 * boostsmith CLI entry point
 */

import { createChildLogger } from '@boostsmith/shared';
import { createProgram } from './program.js';

const logger = createChildLogger({ component: 'cli' });

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
    process.exitCode = 1;
  });
