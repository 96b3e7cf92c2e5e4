#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage, TransportError } from "./core/errors";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(`fatal: ${errorMessage(error)}`);
  if (error instanceof TransportError && error.status === 403) {
    console.error("hint: the archive rejects requests without a contact address; set SEC_USER_AGENT");
  }
  process.exitCode = 1;
});
