import type { Command } from "commander";
import type { SmsOutgoingMessage } from "@smsgate/core/schemas";
import { parsePositiveInt, type CliContext } from "../context.js";

interface SendOptions {
  timeout?: string;
  validity?: string;
  flash?: boolean;
}

export function registerSendCommand(program: Command, context: CliContext): void {
  program
    .command("send <to> <content>")
    .description("Send an SMS through the gateway")
    .option("-t, --timeout <seconds>", "Seconds to wait for the modem")
    .option("--validity <period>", "Relative validity period")
    .option("--flash", "Send as a flash message", false)
    .action(async (to: string, content: string, options: SendOptions) => {
      const message: SmsOutgoingMessage = {
        to,
        content,
        ...(options.timeout !== undefined && {
          timeout: parsePositiveInt(options.timeout, "--timeout"),
        }),
        ...(options.validity !== undefined && {
          validity_period: parsePositiveInt(options.validity, "--validity"),
        }),
        ...(options.flash && { flash: true }),
      };

      const config = await context.loadConfig(program.opts<{ config?: string }>().config);
      const client = await context.createClient(config);
      try {
        const sent = await client.http().sendSms(message);
        context.write(`Sent message ${sent.message_id} (reference ${sent.reference_id})\n`);
      } finally {
        await client.close();
      }
    });
}
