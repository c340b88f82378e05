import { describe, it, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import { createNetworkClient } from "../src/createNetworkClient.js";
import { LogLevel } from "../src/core/interfaces/ILogger.js";
import { InMemoryHttpClient } from "../src/infrastructure/http/InMemoryHttpClient.js";
import { LoggerFactory } from "../src/infrastructure/logging/LoggerFactory.js";
import { NetworkType } from "../src/types/network.types.js";
import { InMemoryPathObserver } from "./helpers/fakes.js";

const Ping = z.object({ pong: z.boolean() });

describe("createNetworkClient", () => {
  afterEach(() => {
    LoggerFactory.setLevel(LogLevel.INFO);
    LoggerFactory.clearCache();
  });

  it("wires the client to the connectivity monitor", async () => {
    const http = new InMemoryHttpClient();
    const observer = new InMemoryPathObserver();
    const { client, reachability } = createNetworkClient({
      config: { logLevel: LogLevel.ERROR },
      httpClient: http,
      observer,
    });

    expect(client.isConnected()).toBe(true);
    expect(observer.startCount).toBe(1);

    observer.emit({ status: "unsatisfied", interfaceType: NetworkType.OTHER });
    const offline = await client.sendRequest({ url: "https://api.example.com/ping" }, Ping);
    expect(offline.kind === "error" && offline.error.kind).toBe("noInternet");
    expect(http.callCount).toBe(0);

    observer.emit({ status: "satisfied", interfaceType: NetworkType.CELLULAR });
    http.enqueueJson({ pong: true });
    const online = await client.sendRequest({ url: "https://api.example.com/ping" }, Ping);
    expect(online).toEqual({ kind: "typed", value: { pong: true } });
    expect(client.transportType()).toBe(NetworkType.CELLULAR);

    reachability.stopMonitoring();
  });

  it("applies config overrides", () => {
    const sink = vi.fn();
    const { client, config, reachability } = createNetworkClient({
      config: { debugMode: true, logLevel: LogLevel.WARNING, debounceMs: 50 },
      httpClient: new InMemoryHttpClient(),
      observer: new InMemoryPathObserver(),
      debugSink: sink,
    });

    expect(config.debugMode).toBe(true);
    expect(config.debounceMs).toBe(50);
    expect(client.isDebugMode()).toBe(true);
    expect(LoggerFactory.getLevel()).toBe(LogLevel.WARNING);
    expect(reachability.isMonitoring()).toBe(false);
    expect(sink).not.toHaveBeenCalled();
  });
});
