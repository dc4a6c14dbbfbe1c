import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerPlayCommand } from "./commands/play";
import { registerCompareCommand } from "./commands/compare";
import { registerConfigCommand } from "./commands/config";
import { errorMessage } from "./commands/errors";

program
  .name("othello")
  .description("Othello against a minimax / alpha-beta computer opponent")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerCompareCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
