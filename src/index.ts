#!/usr/bin/env tsx
/**
 * stackctl entry point.
 */

import { createProcessRuntime, createProgram } from "./cli";

const main = async (): Promise<void> => {
  const runtime = createProcessRuntime();
  await createProgram(runtime).parseAsync(process.argv);
};

main().catch((error: unknown) => {
  console.error("Fatal error", error);
  process.exit(1);
});
