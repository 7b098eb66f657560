#!/usr/bin/env node
import { handleUnknownError } from './errors/index';
import { error } from './output/logger';
import { createProgram } from './cli/program';

// Parse command line arguments
createProgram().parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running commentlint');
  error(err.message);
  process.exit(1);
});
