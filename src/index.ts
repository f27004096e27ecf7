#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";

runCli(hideBin(process.argv), { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Error:", err);
    process.exitCode = 1;
  });
