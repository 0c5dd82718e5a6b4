#!/usr/bin/env -S node --import tsx
import { ImportAbortedError } from '@series-import/import-core';
import { createInterface } from './program';

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = err instanceof ImportAbortedError ? 130 : 1;
});
