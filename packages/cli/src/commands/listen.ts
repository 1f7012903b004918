import type { Command } from "commander";
import type { ClientConfig } from "@smsgate/core/schemas";
import type { CliContext } from "../context.js";
import { formatEvent } from "../format.js";

interface ListenOptions {
  events?: string;
}

function withEventFilter(config: ClientConfig, events: string | undefined): ClientConfig {
  if (!events || !config.websocket) return config;
  const filteredEvents = events
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return {
    ...config,
    websocket: {
      ...config.websocket,
      filteredEvents: filteredEvents.length > 0 ? filteredEvents : null,
    },
  };
}

export function registerListenCommand(program: Command, context: CliContext): void {
  program
    .command("listen")
    .description("Print gateway events until interrupted")
    .option("-e, --events <names>", "Comma-separated event names to subscribe to")
    .action(async (options: ListenOptions) => {
      const config = await context.loadConfig(program.opts<{ config?: string }>().config);
      const client = await context.createClient(withEventFilter(config, options.events));

      client.onEvent((event) => {
        context.write(`${formatEvent(event)}\n`);
      });
      context.onShutdown(() => void client.stop());

      try {
        await client.runBlocking();
      } finally {
        await client.close();
      }
    });
}
