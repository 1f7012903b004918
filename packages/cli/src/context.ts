import { loadConfig } from "@smsgate/core/config";
import { ConfigError } from "@smsgate/core/errors";
import type { ClientConfig } from "@smsgate/core/schemas";
import { SmsClient } from "@smsgate/runtime";

/** What every command needs from the outside world. */
export interface CliContext {
  loadConfig(configPath: string | undefined): Promise<ClientConfig>;
  createClient(config: ClientConfig): Promise<SmsClient>;
  write(text: string): void;
  /** Registers a handler for SIGINT and SIGTERM. */
  onShutdown(handler: () => void): void;
}

export const defaultContext: CliContext = {
  loadConfig: (configPath) => loadConfig({ configPath }),
  createClient: (config) => SmsClient.create(config),
  write: (text) => {
    process.stdout.write(text);
  },
  onShutdown: (handler) => {
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
  },
};

/** Parses a positive integer option, or fails with the option's name. */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return parsed;
}
