/**
 * HTTP request channel over undici.
 *
 * Sends JSON bodies and hands back the raw response text; envelope handling
 * lives in the HTTP client.
 */

import { Agent, fetch } from "undici";
import { ConnectError } from "../errors/catalog.js";

export type RequestMethod = "GET" | "POST";

export interface RequestOptions {
  body?: unknown;
  timeoutMs?: number | null;
}

export interface RawResponse {
  status: number;
  contentType: string | null;
  body: string;
}

export interface RequestChannel {
  request(
    method: RequestMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<RawResponse>;
  close(): Promise<void>;
}

export interface RequestChannelOptions {
  baseUrl: string;
  authorization?: string;
  /** Extra trusted CA in PEM form. */
  ca?: string;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export function openRequestChannel(
  options: RequestChannelOptions,
): RequestChannel {
  const dispatcher = options.ca
    ? new Agent({ connect: { ca: options.ca } })
    : undefined;

  return {
    async request(method, path, requestOptions = {}) {
      const url = joinUrl(options.baseUrl, path);
      const headers: Record<string, string> = { accept: "application/json" };
      if (options.authorization) {
        headers.authorization = options.authorization;
      }

      let body: string | undefined;
      if (requestOptions.body !== undefined) {
        headers["content-type"] = "application/json";
        body = JSON.stringify(requestOptions.body);
      }

      const res = await fetch(url, {
        method,
        headers,
        body,
        dispatcher,
        signal:
          requestOptions.timeoutMs != null
            ? AbortSignal.timeout(requestOptions.timeoutMs)
            : undefined,
      }).catch((err: unknown) => {
        throw new ConnectError(
          `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
          { url, method },
          { cause: err },
        );
      });

      return {
        status: res.status,
        contentType: res.headers.get("content-type"),
        body: await res.text(),
      };
    },

    async close() {
      await dispatcher?.close();
    },
  };
}
