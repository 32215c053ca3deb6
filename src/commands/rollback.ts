import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient, type ClientOptions } from "./shared";

export const rollbackCommand = new Command("rollback")
  .description("Restore an earlier version's value as a new version")
  .argument("<name>", "secret name")
  .argument("<version>", "version id to restore")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, versionId: string, opts: ClientOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const { version, restoredFrom } = await lifecycle.rollback(name, versionId, { signal });
      console.log(`  ✓ ${name}: value of ${restoredFrom} is now version ${version.versionId}`);
    });
  });
