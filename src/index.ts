#!/usr/bin/env node
import { run } from "./cli";
import { getErrorMessage } from "./core/utils";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exitCode = 1;
});
