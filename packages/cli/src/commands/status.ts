import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { formatStatus, type StatusReport } from "../format.js";

export function registerStatusCommand(program: Command, context: CliContext): void {
  program
    .command("status")
    .description("Show gateway version and modem status")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      const config = await context.loadConfig(program.opts<{ config?: string }>().config);
      const client = await context.createClient(config);

      try {
        const http = client.http();
        const report: StatusReport = {
          version: await http.getVersion(),
          phoneNumber: await http.getPhoneNumber(),
          network: await http.getNetworkStatus(),
          signal: await http.getSignalStrength(),
          battery: await http.getBatteryLevel(),
        };

        context.write(
          options.json ? `${JSON.stringify(report, null, 2)}\n` : `${formatStatus(report)}\n`,
        );
      } finally {
        await client.close();
      }
    });
}
