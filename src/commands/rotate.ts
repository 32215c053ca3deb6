import { Command } from "commander";
import { CONFIG_FILE } from "../config";
import { ValidationError } from "../errors";
import { CHARSETS, DEFAULT_LENGTH, isCharset } from "../secrets/generator";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, runWithClient } from "./shared";

interface RotateOptions {
  config: string;
  length: string;
  charset: string;
}

export const rotateCommand = new Command("rotate")
  .description("Replace a secret's value with a generated one")
  .argument("<name>", "secret name")
  .option("-l, --length <n>", "length of the generated value", String(DEFAULT_LENGTH))
  .option(
    "--charset <charset>",
    `one of ${Object.keys(CHARSETS).join(", ")}`,
    "alphanumeric"
  )
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, CONFIG_FILE)
  .action(async (name: string, opts: RotateOptions) => {
    await runWithClient(opts, async ({ lifecycle }, signal) => {
      const charset = opts.charset;
      if (!isCharset(charset)) {
        throw new ValidationError(
          `Unknown charset "${charset}". Available: ${Object.keys(CHARSETS).join(", ")}`
        );
      }
      const length = Number(opts.length);
      const version = await lifecycle.rotate(name, { length, charset }, { signal });
      console.log(`  ✓ Rotated ${name} → version ${version.versionId}`);
    });
  });
