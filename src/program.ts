import { Command } from "commander";
import { setCommand } from "./commands/set";
import { getCommand } from "./commands/get";
import { listCommand } from "./commands/list";
import { updateCommand } from "./commands/update";
import { copyCommand, moveCommand } from "./commands/copy";
import { deleteCommand, purgeCommand, recoverCommand } from "./commands/delete";
import { historyCommand } from "./commands/history";
import { rotateCommand } from "./commands/rotate";
import { rollbackCommand } from "./commands/rollback";
import { nameCommand } from "./commands/name";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  // Root options only before the sub-command, so `get --version <id>` reaches `get`.
  program
    .name("kvault")
    .description("Manage versioned secrets in a cloud key vault")
    .version(VERSION)
    .enablePositionalOptions();

  program.addCommand(setCommand);
  program.addCommand(getCommand);
  program.addCommand(listCommand);
  program.addCommand(updateCommand);
  program.addCommand(copyCommand);
  program.addCommand(moveCommand);
  program.addCommand(deleteCommand);
  program.addCommand(recoverCommand);
  program.addCommand(purgeCommand);
  program.addCommand(historyCommand);
  program.addCommand(rotateCommand);
  program.addCommand(rollbackCommand);
  program.addCommand(nameCommand);
  return program;
}
