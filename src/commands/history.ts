import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import type { SecretVersion } from "../secrets/lifecycle";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient, type ClientOptions } from "./shared";

export const historyCommand = new Command("history")
  .description("List every version of a secret, oldest first")
  .argument("<name>", "secret name")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: ClientOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const versions: SecretVersion[] = [];
      for await (const version of lifecycle.getVersions(name, { signal })) {
        versions.push(version);
      }
      console.log(`${versions.length} version${versions.length === 1 ? "" : "s"} of ${name}:\n`);
      versions.forEach((version, i) => {
        const created = version.createdAt?.toISOString() ?? "unknown";
        const flags = [
          i === versions.length - 1 ? "current" : undefined,
          version.enabled ? undefined : "disabled",
        ].filter((f) => f !== undefined);
        const suffix = flags.length > 0 ? `  (${flags.join(", ")})` : "";
        console.log(`  ${i + 1}. ${version.versionId}  ${created}${suffix}`);
      });
    });
  });
