#!/usr/bin/env node
import { main } from "./app/main.js";
import { devError } from "./shared/index.js";

main().catch((err: unknown) => {
  devError("ClauseLens failed to start:", err instanceof Error ? err.message : err);
  process.exit(1);
});
