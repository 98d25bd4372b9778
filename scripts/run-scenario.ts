#!/usr/bin/env tsx

import { runCli } from "../src/cli.js";

async function main() {
  const code = await runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
  process.exit(code);
}

// Run the script
main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
