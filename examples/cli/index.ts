/**
 * HalPay CLI Demo
 *
 * Usage: npm start -- <command> [args...]
 *        npm start -- help
 */
import { HalPayClient } from "@halpay/core";

import { createClient, loadEnv } from "./client";
import { createRegistry, runCommand } from "./tasks";

async function main(): Promise<void> {
  loadEnv();
  let client: HalPayClient | undefined;

  process.exitCode = await runCommand(createRegistry(), process.argv.slice(2), {
    getClient: () => (client ??= createClient()),
    write: (line) => console.log(line),
  });
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
