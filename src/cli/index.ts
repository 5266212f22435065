#!/usr/bin/env node
import { create_program } from './program';

create_program()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
