#!/usr/bin/env node

import { CAT_HELP, parseCatArgs, runCat } from "./cat.js";

async function main(): Promise<void> {
  const args = parseCatArgs(process.argv.slice(2));
  if (!args.device && !args.help) {
    console.log(CAT_HELP);
    process.exit(1);
  }
  process.exit(await runCat(args));
}

main().catch((err) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
