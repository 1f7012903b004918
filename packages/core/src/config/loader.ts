import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  ClientConfigSchema,
  type ClientConfig,
} from "../schemas/client-config.js";
import { ConfigError } from "../errors/catalog.js";
import { DEFAULT_CONFIG_PATH } from "./defaults.js";

export interface LoadConfigOptions {
  configPath?: string;
  /** Environment to overlay on the file. Pass `{}` to ignore the process env. */
  env?: NodeJS.ProcessEnv;
}

type ConfigTree = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads `SMSGATE_*` variables into a partial config document.
 * Unset variables are left out so they never mask file values.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigTree {
  const tree: ConfigTree = {};
  const websocket: ConfigTree = {};
  const http: ConfigTree = {};
  const logging: ConfigTree = {};

  if (env.SMSGATE_WS_URL) websocket.url = env.SMSGATE_WS_URL;
  if (env.SMSGATE_WS_AUTH) websocket.authorization = env.SMSGATE_WS_AUTH;
  if (env.SMSGATE_AUTO_RECONNECT) {
    websocket.autoReconnect = env.SMSGATE_AUTO_RECONNECT !== "false";
  }
  if (env.SMSGATE_EVENTS) {
    websocket.filteredEvents = env.SMSGATE_EVENTS.split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }
  if (env.SMSGATE_HTTP_URL) http.url = env.SMSGATE_HTTP_URL;
  if (env.SMSGATE_HTTP_AUTH) http.authorization = env.SMSGATE_HTTP_AUTH;
  if (env.SMSGATE_AUTH) tree.authorization = env.SMSGATE_AUTH;
  if (env.SMSGATE_CERTIFICATE) tree.certificate = env.SMSGATE_CERTIFICATE;
  if (env.SMSGATE_LOG_LEVEL) logging.level = env.SMSGATE_LOG_LEVEL;

  if (Object.keys(websocket).length > 0) tree.websocket = websocket;
  if (Object.keys(http).length > 0) tree.http = http;
  if (Object.keys(logging).length > 0) tree.logging = logging;
  return tree;
}

/** One-level merge: sections are merged key by key, scalars are replaced. */
function mergeConfig(base: ConfigTree, overlay: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = merged[key];
    merged[key] =
      isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

/** Validates a config document, turning schema failures into a ConfigError. */
export function parseConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(z.prettifyError(result.error), {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ClientConfig> {
  const configPath = options?.configPath ?? DEFAULT_CONFIG_PATH;
  const env = options?.env ?? process.env;

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error && "code" in err && err.code === "ENOENT") ||
      options?.configPath !== undefined
    ) {
      throw err;
    }
    // No file at the default location: the environment may hold everything
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }

  return parseConfig(mergeConfig(parsed, configFromEnv(env)));
}
