#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[worldtalk] Unhandled rejection:", reason);
  process.exit(1);
});

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(`[worldtalk] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
