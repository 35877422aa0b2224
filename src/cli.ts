#!/usr/bin/env node
import { runCli } from "./presentators/cli/cli";

runCli(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
