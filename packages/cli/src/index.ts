#!/usr/bin/env tsx
import { errorMessage } from '@stem-tutor/shared';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
