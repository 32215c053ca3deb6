import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import type { LifecycleManager, SecretListing } from "../secrets/lifecycle";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient } from "./shared";

interface ListFlags {
  deleted: boolean;
  group?: string;
}

interface ListOptions extends ListFlags {
  config: string;
  byGroup: boolean;
}

export function formatListing(listing: SecretListing): string {
  const { identity, metadata } = listing;
  let line = `    · ${identity.userName}`;
  if (identity.backendId !== identity.userName) line += ` (${identity.backendId})`;
  if (metadata.groups.length > 0) line += `  [${metadata.groups.join(", ")}]`;
  if (listing.deleted) line += "  (deleted)";
  else if (!listing.enabled) line += "  (disabled)";
  return line;
}

/** Prints nothing until every page has been read. */
export async function printListing(
  lifecycle: LifecycleManager,
  flags: ListFlags,
  signal?: AbortSignal
): Promise<void> {
  const listings = await lifecycle.listAll(undefined, {
    includeDeleted: flags.deleted,
    group: flags.group,
    signal,
  });
  if (listings.length === 0) {
    console.log("No secrets found.");
    return;
  }
  console.log("Secrets:\n");
  for (const listing of listings) console.log(formatListing(listing));
  console.log(`\n${listings.length} secret${listings.length === 1 ? "" : "s"}.`);
}

export const listCommand = new Command("list")
  .description("List secrets in the vault")
  .option("--deleted", "include soft-deleted secrets", false)
  .option("-g, --group <group>", "only secrets in this group")
  .option("--by-group", "group the output by group name", false)
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (opts: ListOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      if (opts.byGroup) {
        const groups = await lifecycle.groupSecrets(undefined, { signal });
        if (groups.size === 0) {
          console.log("No secrets found.");
          return;
        }
        for (const [group, members] of groups) {
          console.log(`  ${group}`);
          for (const listing of members) console.log(formatListing(listing));
        }
        return;
      }

      await printListing(lifecycle, opts, signal);
    });
  });
