import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient } from "./shared";

interface TransferOptions {
  config: string;
  from?: string;
  to?: string;
  newName?: string;
}

export const copyCommand = new Command("copy")
  .description("Copy a secret to another vault or name")
  .argument("<name>", "secret name")
  .option("--from <vault>", "source vault (defaults to the configured vault)")
  .option("--to <vault>", "destination vault (defaults to the source vault)")
  .option("--new-name <name>", "name in the destination")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: TransferOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const version = await lifecycle.copy(
        name,
        { vault: opts.to, name: opts.newName },
        { vault: opts.from, signal }
      );
      console.log(`  ✓ Copied ${name} to ${version.identity.namespace}/${version.identity.userName}`);
    });
  });

export const moveCommand = new Command("move")
  .description("Move a secret to another vault or name (the source is soft-deleted)")
  .argument("<name>", "secret name")
  .option("--from <vault>", "source vault (defaults to the configured vault)")
  .option("--to <vault>", "destination vault (defaults to the source vault)")
  .option("--new-name <name>", "name in the destination")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: TransferOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const version = await lifecycle.move(
        name,
        { vault: opts.to, name: opts.newName },
        { vault: opts.from, signal }
      );
      console.log(`  ✓ Moved ${name} to ${version.identity.namespace}/${version.identity.userName}`);
    });
  });
