#!/usr/bin/env node
import { buildProgram } from "./program.js";

const program = buildProgram();
program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
