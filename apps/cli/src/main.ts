#!/usr/bin/env -S npx tsx
import '../../../scripts/load-env';
import { errorMessage } from '@corroborate/core';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
