#!/usr/bin/env -S npx tsx
import { run } from './cli.js';

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

// Run CLI
void main();
