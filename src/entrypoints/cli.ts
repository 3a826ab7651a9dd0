#!/usr/bin/env tsx
/**
 * CLI entry point for stampver.
 *
 * Every fatal error ends the process with exit code 1 and a message naming the
 * offending file or field.
 */

import { main } from '../cli/index.ts';
import { handleError } from '../cli/output.ts';

process.on('unhandledRejection', (reason) => {
  handleError(reason);
});

main().catch(handleError);
