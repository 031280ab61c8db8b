#!/usr/bin/env node
import { runCommand } from './commands.js';
import { asErrorResponse } from './errors.js';

export async function runCli(argv = process.argv.slice(2)): Promise<void> {
  await runCommand(argv, {
    write: (text) => {
      process.stdout.write(text);
    },
  });
}

runCli().catch((error: unknown) => {
  console.error(JSON.stringify(asErrorResponse(error), null, 2));
  process.exit(1);
});
