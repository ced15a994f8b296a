/**
 * c2r-deploy CLI — Program Definition
 *
 * Commands are registered here so tests can drive the same program the
 * executable runs.
 */

import { Command } from "commander";
import { registerDeployCommand } from "./commands/deploy";
import { registerDetectCommand } from "./commands/detect";
import { registerProductsCommand } from "./commands/products";
import { setDebugMode } from "./output";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("c2r-deploy")
    .description("Deploy Microsoft Office Click-to-Run product editions")
    .version("0.1.0")
    .option("--debug", "Show debug output and engine logs", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
    });

  registerDeployCommand(program);
  registerDetectCommand(program);
  registerProductsCommand(program);

  return program;
}
