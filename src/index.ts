#!/usr/bin/env node
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

main().catch((e) => {
  console.error("[CLI] Fatal:", e);
  process.exit(1);
});
