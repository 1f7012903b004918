import type { Command } from "commander";
import { DEFAULT_PAGE_SIZE } from "@smsgate/core/pagination";
import { parsePositiveInt, type CliContext } from "../context.js";
import { formatMessage } from "../format.js";

interface HistoryOptions {
  limit: string;
  reverse: boolean;
  json?: boolean;
}

export function registerHistoryCommand(program: Command, context: CliContext): void {
  program
    .command("history <phone>")
    .description("Show stored messages for a phone number")
    .option("-n, --limit <count>", "Number of messages to show", "20")
    .option("-r, --reverse", "Newest first", false)
    .option("--json", "Output as JSON")
    .action(async (phone: string, options: HistoryOptions) => {
      const limit = parsePositiveInt(options.limit, "--limit");
      const config = await context.loadConfig(program.opts<{ config?: string }>().config);
      const client = await context.createClient(config);

      try {
        const messages = await client
          .http()
          .paginateMessages(phone, {
            reverse: options.reverse,
            limit: Math.min(limit, DEFAULT_PAGE_SIZE),
          })
          .take(limit);

        if (options.json) {
          context.write(`${JSON.stringify(messages, null, 2)}\n`);
          return;
        }
        for (const message of messages) {
          context.write(`${formatMessage(message)}\n`);
        }
      } finally {
        await client.close();
      }
    });
}
