import { Command } from "commander";
import { errorMessage } from "../errors";
import { describeName } from "../secrets/sanitizer";

export const nameCommand = new Command("name")
  .description("Show how a secret name is stored")
  .argument("<name>", "secret name")
  .action((name: string) => {
    try {
      const info = describeName(name);
      console.log(`Name:     ${info.originalName}`);
      console.log(`Stored:   ${info.sanitizedName}`);
      console.log(`Modified: ${info.wasModified ? "yes" : "no"}`);
      console.log(`Hashed:   ${info.isHashed ? "yes" : "no"}`);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });
