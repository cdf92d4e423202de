#!/usr/bin/env node
import "dotenv/config";
import { main } from "./app/main.js";

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exitCode = 1;
});
