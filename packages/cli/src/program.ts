import { Command } from "commander";
import { registerHistoryCommand } from "./commands/history.js";
import { registerListenCommand } from "./commands/listen.js";
import { registerSendCommand } from "./commands/send.js";
import { registerStatusCommand } from "./commands/status.js";
import { defaultContext, type CliContext } from "./context.js";

export function createProgram(
  version: string,
  context: CliContext = defaultContext,
): Command {
  const program = new Command();

  program
    .name("smsgate")
    .description("Talk to an SMS gateway over its HTTP and WebSocket APIs")
    .version(version)
    .option("-c, --config <path>", "Path to the JSON config file");

  registerListenCommand(program, context);
  registerSendCommand(program, context);
  registerHistoryCommand(program, context);
  registerStatusCommand(program, context);

  return program;
}
