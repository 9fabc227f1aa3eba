#!/usr/bin/env node
import "dotenv/config";
import { PktmapError } from "@pktmap/schemas";
import { buildProgram } from "./program.js";

// Unhandled failures exit non-zero
process.on("unhandledRejection", (reason) => {
  console.error("[pktmap] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[pktmap] Uncaught exception:", err);
  process.exit(1);
});

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof PktmapError) {
    console.error(`pktmap: ${err.message}`);
  } else {
    console.error("pktmap:", err);
  }
  process.exit(1);
});
