#!/usr/bin/env node

// src/index.ts - CLI entry point

// Check Node.js version before doing any work
const nodeVersion = process.version;
const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0]);
if (majorVersion < 20) {
  console.error(`❌ Node.js 20+ required. Current: ${nodeVersion}`);
  process.exit(1);
}

import { createProgram, CommanderError } from './cli/program.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const program = await createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      process.exit(error.exitCode);
    }
    Logger.error(error instanceof Error ? error.message : String(error));
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
