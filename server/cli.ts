#!/usr/bin/env node
import { createProgram } from "./cli/program.js";

const program = createProgram(
  {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text)
  },
  (code) => {
    process.exitCode = code;
  }
);

await program.parseAsync();
