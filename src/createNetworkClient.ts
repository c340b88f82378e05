/**
 * Wires a ready-to-use APIClient from configuration
 */

import { loadConfig, NetworkConfig } from "./config/environment.js";
import { IHttpClient } from "./core/interfaces/IHttpClient.js";
import { IPathObserver } from "./core/interfaces/IPathObserver.js";
import { AxiosHttpClient } from "./infrastructure/http/AxiosHttpClient.js";
import { LoggerFactory } from "./infrastructure/logging/LoggerFactory.js";
import { InterfacePathObserver } from "./infrastructure/network/InterfacePathObserver.js";
import { APIClient } from "./services/APIClient.js";
import { NetworkReachability } from "./services/NetworkReachability.js";
import { DiagnosticSink } from "./utils/requestPrinter.js";

export interface NetworkClientOverrides {
  config?: Partial<NetworkConfig>;
  httpClient?: IHttpClient;
  observer?: IPathObserver;
  debugSink?: DiagnosticSink;
}

export interface NetworkClient {
  client: APIClient;
  reachability: NetworkReachability;
  config: NetworkConfig;
}

export function createNetworkClient(
  overrides: NetworkClientOverrides = {}
): NetworkClient {
  const config: NetworkConfig = {
    ...loadConfig(),
    ...overrides.config,
  };

  LoggerFactory.setLevel(config.logLevel);

  const reachability = new NetworkReachability({
    observer:
      overrides.observer ??
      new InterfacePathObserver({ pollIntervalMs: config.pollIntervalMs }),
    debounceMs: config.debounceMs,
  });

  const client = new APIClient({
    httpClient:
      overrides.httpClient ??
      new AxiosHttpClient({ timeout: config.requestTimeoutMs }),
    reachability,
    debugMode: config.debugMode,
    debugSink: overrides.debugSink,
  });

  return { client, reachability, config };
}
