#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "@tickweave/schemas";
import { buildProgram } from "./program.js";

const program = buildProgram({
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  color: process.stdout.isTTY,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
