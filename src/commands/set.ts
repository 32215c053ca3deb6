import { Command } from "commander";
import { SecretBuffer } from "../auth/secret-buffer";
import { CONFIG_FILE } from "../config";
import { ValidationError } from "../errors";
import {
  CONFIG_DESCRIPTION,
  CONFIG_FLAGS,
  collect,
  parseDate,
  parseTags,
  readStdin,
  runWithClient,
} from "./shared";

interface SetOptions {
  config: string;
  stdin: boolean;
  group: string[];
  replaceGroups: boolean;
  note?: string;
  folder?: string;
  expires?: string;
  notBefore?: string;
  tag: string[];
  contentType?: string;
}

export const setCommand = new Command("set")
  .description("Store a new version of a secret")
  .argument("<name>", "secret name")
  .argument("[value]", "secret value (omit with --stdin)")
  .option("--stdin", "read the value from stdin", false)
  .option("-g, --group <group>", "add to a group (repeatable)", collect, [])
  .option("--replace-groups", "replace stored groups instead of adding", false)
  .option("--note <note>", "free-text note")
  .option("--folder <path>", "folder path, e.g. app/prod")
  .option("--expires <date>", "expiry date (ISO 8601)")
  .option("--not-before <date>", "not usable before this date (ISO 8601)")
  .option("-t, --tag <key=value>", "custom tag (repeatable)", collect, [])
  .option("--content-type <type>", "content type")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, value: string | undefined, opts: SetOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      if (opts.stdin === (value !== undefined)) {
        throw new ValidationError("Pass the value either as an argument or with --stdin");
      }
      const secret = value !== undefined ? SecretBuffer.from(value) : await readStdin();
      const version = await lifecycle.set(name, secret, {
        groups: opts.group.length > 0 ? opts.group : undefined,
        replaceGroups: opts.replaceGroups,
        note: opts.note,
        folder: opts.folder,
        expiresAt: opts.expires !== undefined ? parseDate(opts.expires) : undefined,
        notBefore: opts.notBefore !== undefined ? parseDate(opts.notBefore) : undefined,
        custom: opts.tag.length > 0 ? parseTags(opts.tag) : undefined,
        contentType: opts.contentType,
        signal,
      });
      console.log(`  ✓ ${name} → version ${version.versionId}`);
    });
  });
