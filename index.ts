#!/usr/bin/env node
import { run } from "./src/cli.js";
import { GitRepository } from "./src/repository.js";

process.exitCode = await run(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  openRepository: (cwd, baseBranch) => GitRepository.open(cwd, baseBranch),
});
