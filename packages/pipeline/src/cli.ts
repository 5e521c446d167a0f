#!/usr/bin/env node

import { runCli } from "./run-cli.js";

async function main(): Promise<void> {
  // npm run scripts start in the package root; INIT_CWD is where the user invoked them.
  const cwd = process.env.INIT_CWD ?? process.cwd();
  await runCli(process.argv.slice(2), process.env, cwd, {
    log: (message) => console.log(message),
    warn: (message) => console.warn(message)
  });
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
