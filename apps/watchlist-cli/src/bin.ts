#!/usr/bin/env tsx
import { runCli } from './program';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
