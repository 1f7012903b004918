import { describe, it, expect, vi } from "vitest";
import type { Logger } from "@smsgate/core/logger";
import { AlreadyRunningError, ConnectError } from "@smsgate/core/errors";
import { EventConnection } from "@smsgate/core/events";
import { WebSocketConfigSchema } from "@smsgate/core/schemas";
import { FakeTransport, waitForState } from "@smsgate/core/test-utils";
import { ExecutionDriver } from "./driver.js";

function makeMockLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function setup(autoReconnect = true) {
  const transport = new FakeTransport();
  const logger = makeMockLogger();
  const websocket = {
    ...WebSocketConfigSchema.parse({ url: "ws://127.0.0.1:3000/ws" }),
    autoReconnect,
    reconnectIntervalMs: 1,
    maxReconnectDelayMs: 8,
    reconnectJitterMs: 0,
  };
  const createConnection = vi.fn(
    () => new EventConnection({ websocket, transport, logger }),
  );
  const driver = new ExecutionDriver({ createConnection, logger });
  return { driver, transport, logger, createConnection };
}

describe("ExecutionDriver", () => {
  describe("runBlocking", () => {
    it("resolves once the connection is stopped", async () => {
      const { driver, transport } = setup();

      const run = driver.runBlocking();
      await transport.opened(1);
      expect(driver.isRunning()).toBe(true);

      await driver.stop();
      await expect(run).resolves.toBeUndefined();
      expect(driver.isRunning()).toBe(false);
      expect(driver.connection()?.getState()).toBe("closed");
    });

    it("rejects with the error that closed the connection", async () => {
      const { driver, transport } = setup(false);
      transport.failNext(new ConnectError("connection refused"));

      await expect(driver.runBlocking()).rejects.toThrow("connection refused");
      expect(driver.isRunning()).toBe(false);
    });
  });

  describe("runBackground", () => {
    it("returns a handle straight away", async () => {
      const { driver, transport } = setup();

      const handle = driver.runBackground();
      expect(handle.connection).toBe(driver.connection());

      await transport.opened(1);
      await waitForState(handle.connection, "open");
      await handle.stop();
      await expect(handle.done).resolves.toBeUndefined();
    });

    it("logs a run that ends in an error", async () => {
      const { driver, transport, logger } = setup(false);
      transport.failNext(new ConnectError("connection refused"));

      const handle = driver.runBackground();
      await expect(handle.done).rejects.toThrow("connection refused");
      await Promise.resolve();

      expect(logger.error).toHaveBeenCalledWith(
        { err: expect.any(ConnectError) },
        "Background event connection closed with an error",
      );
    });
  });

  describe("one run at a time", () => {
    it("refuses a second run of either kind while one is active", async () => {
      const { driver, transport } = setup();

      const handle = driver.runBackground();
      await transport.opened(1);

      expect(() => driver.runBackground()).toThrow(AlreadyRunningError);
      await expect(driver.runBlocking()).rejects.toBeInstanceOf(AlreadyRunningError);

      await handle.stop();
    });

    it("builds a fresh connection for a run after the last one closed", async () => {
      const { driver, transport, createConnection } = setup();

      const first = driver.runBackground();
      await transport.opened(1);
      await first.stop();

      const second = driver.runBackground();
      expect(second.connection).not.toBe(first.connection);
      expect(createConnection).toHaveBeenCalledTimes(2);

      await transport.opened(2);
      await second.stop();
      expect(transport.attempts).toHaveLength(2);
    });
  });

  it("stop without a run does nothing", async () => {
    const { driver, createConnection } = setup();
    await expect(driver.stop()).resolves.toBeUndefined();
    expect(driver.connection()).toBeNull();
    expect(createConnection).not.toHaveBeenCalled();
  });
});
