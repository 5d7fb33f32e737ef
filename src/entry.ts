#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { formatErrorMessage } from "./utils/errors.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${formatErrorMessage(err)}`);
    process.exitCode = 1;
  });
