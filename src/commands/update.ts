import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import { ValidationError } from "../errors";
import type { SecretUpdate } from "../secrets/lifecycle";
import {
  CONFIG_DESCRIPTION,
  CONFIG_FLAGS,
  collect,
  parseDate,
  parseTags,
  runWithClient,
} from "./shared";

export interface UpdateFlags {
  group: string[];
  replaceGroups: boolean;
  tag: string[];
  replaceTags: boolean;
  note?: string;
  folder?: string;
  expires?: string;
  clearExpires: boolean;
  notBefore?: string;
  clearNotBefore: boolean;
  rename?: string;
}

interface UpdateOptions extends UpdateFlags {
  config: string;
}

function pickDate(
  value: string | undefined,
  clear: boolean,
  flag: string
): Date | null | undefined {
  if (clear && value !== undefined) {
    throw new ValidationError(`--${flag} and --clear-${flag} cannot be used together`);
  }
  if (clear) return null;
  return value !== undefined ? parseDate(value) : undefined;
}

export function toSecretUpdate(flags: UpdateFlags): SecretUpdate {
  return {
    groups: flags.group.length > 0 || flags.replaceGroups ? flags.group : undefined,
    replaceGroups: flags.replaceGroups,
    custom: flags.tag.length > 0 || flags.replaceTags ? parseTags(flags.tag) : undefined,
    replaceCustom: flags.replaceTags,
    note: flags.note,
    folder: flags.folder,
    expiresAt: pickDate(flags.expires, flags.clearExpires, "expires"),
    notBefore: pickDate(flags.notBefore, flags.clearNotBefore, "not-before"),
    rename: flags.rename,
  };
}

export const updateCommand = new Command("update")
  .description("Change a secret's metadata or name, keeping its value")
  .argument("<name>", "secret name")
  .option("-g, --group <group>", "add to a group (repeatable)", collect, [])
  .option("--replace-groups", "replace stored groups instead of adding", false)
  .option("-t, --tag <key=value>", "custom tag (repeatable)", collect, [])
  .option("--replace-tags", "replace stored custom tags instead of merging", false)
  .option("--note <note>", "free-text note")
  .option("--folder <path>", "folder path, e.g. app/prod")
  .option("--expires <date>", "expiry date (ISO 8601)")
  .option("--clear-expires", "remove the expiry date", false)
  .option("--not-before <date>", "not usable before this date (ISO 8601)")
  .option("--clear-not-before", "remove the not-before date", false)
  .option("--rename <name>", "move the secret to a new name")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: UpdateOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const version = await lifecycle.update(name, toSecretUpdate(opts), { signal });
      const shown = version.identity.userName;
      console.log(
        shown === name
          ? `  ✓ ${name} → version ${version.versionId}`
          : `  ✓ ${name} renamed to ${shown} → version ${version.versionId}`
      );
    });
  });
