#!/usr/bin/env node

import { MemoryManager } from "./memory";
import { runStdioServer } from "./server";

// stdout carries the protocol; everything else goes to stderr.
const manager = new MemoryManager({ workingDir: process.argv[2] || process.cwd() });

async function main() {
  manager.initialize();
  await runStdioServer(manager);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
