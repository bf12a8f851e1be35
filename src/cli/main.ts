#!/usr/bin/env node

import { formatErrorMessage } from "../errors.js";
import { createProgram } from "./program.js";
import { createCliRuntime } from "./runtime.js";

const program = createProgram({
  io: {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  },
  createRuntime: (options) => createCliRuntime(options),
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`bulk-restore: ${formatErrorMessage(err)}\n`);
  process.exitCode = 1;
});
