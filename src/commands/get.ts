import { Command } from "commander";
import { withSecret } from "../auth/secret-buffer";
import { CONFIG_FILE } from "../config";
import type { SecretVersion } from "../secrets/lifecycle";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient } from "./shared";

interface GetOptions {
  config: string;
  version?: string;
  metadata: boolean;
}

export function formatMetadata(version: SecretVersion): string[] {
  const { identity, metadata } = version;
  const lines = [
    `Name:     ${identity.userName}`,
    `Stored:   ${identity.backendId}`,
    `Version:  ${version.versionId}`,
    `Enabled:  ${version.enabled ? "yes" : "no"}`,
  ];
  if (version.createdAt) lines.push(`Created:  ${version.createdAt.toISOString()}`);
  if (metadata.groups.length > 0) lines.push(`Groups:   ${metadata.groups.join(", ")}`);
  if (metadata.folder) lines.push(`Folder:   ${metadata.folder}`);
  if (metadata.note) lines.push(`Note:     ${metadata.note}`);
  if (metadata.expiresAt) lines.push(`Expires:  ${metadata.expiresAt.toISOString()}`);
  for (const [key, value] of Object.entries(metadata.custom)) {
    lines.push(`Tag:      ${key}=${value}`);
  }
  return lines;
}

export const getCommand = new Command("get")
  .description("Print a secret's value")
  .argument("<name>", "secret name")
  .option("--version <id>", "read a specific version")
  .option("-m, --metadata", "print metadata instead of the value", false)
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: GetOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const { version, value } = await lifecycle.get(name, { version: opts.version, signal });
      await withSecret(value, async (secret) => {
        if (opts.metadata) {
          for (const line of formatMetadata(version)) console.log(line);
        } else {
          secret.use((v) => process.stdout.write(`${v}\n`));
        }
      });
    });
  });
