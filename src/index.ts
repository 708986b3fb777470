#!/usr/bin/env node
/**
 * cx - cut and paste files and directories from the command line
 */

import { main as program } from './cli/program';
import { runEffect } from './effect/runtime';

async function main() {
  try {
    await runEffect(program(process.argv.slice(2)));
  } catch (error) {
    console.error(`cx: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
