import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient, type ClientOptions } from "./shared";

export const deleteCommand = new Command("delete")
  .description("Soft-delete a secret (recoverable until purged)")
  .argument("<name>", "secret name")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: ClientOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const deleted = await lifecycle.delete(name, { signal });
      const purge = deleted.scheduledPurgeAt
        ? `, purged on ${deleted.scheduledPurgeAt.toISOString()}`
        : "";
      console.log(`  ✓ Deleted ${name}${purge}`);
    });
  });

export const recoverCommand = new Command("recover")
  .description("Restore a soft-deleted secret")
  .argument("<name>", "secret name")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: ClientOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      await lifecycle.recover(name, { signal });
      console.log(`  ✓ Recovered ${name}`);
    });
  });

export const purgeCommand = new Command("purge")
  .description("Permanently remove a soft-deleted secret")
  .argument("<name>", "secret name")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: ClientOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      await lifecycle.purge(name, { signal });
      console.log(`  ✓ Purged ${name}`);
    });
  });
