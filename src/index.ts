#!/usr/bin/env node
import "dotenv/config";
import { buildProgram } from "./cli/commands.js";
import { describeError } from "./errors.js";

const program = buildProgram();
program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(describeError(e));
  process.exitCode = 1;
});
