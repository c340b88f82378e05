/**
 * Connectivity monitor.
 * Tracks whether the host is online and over which kind of interface, and
 * notifies subscribers once a change has settled.
 */

import { IPathObserver } from "../core/interfaces/IPathObserver.js";
import { ILogger } from "../core/interfaces/ILogger.js";
import { InterfacePathObserver } from "../infrastructure/network/InterfacePathObserver.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import {
  ConnectivityListener,
  ConnectivityState,
  NetworkPath,
  NetworkStatus,
  NetworkType,
} from "../types/network.types.js";

export const DEFAULT_DEBOUNCE_MS = 300;

export interface NetworkReachabilityOptions {
  observer?: IPathObserver;
  /** Settling window for change notifications */
  debounceMs?: number;
  logger?: ILogger;
}

function stateFromPath(path: NetworkPath): ConnectivityState {
  const isConnected = path.status === "satisfied";
  return {
    isConnected,
    status: isConnected ? NetworkStatus.CONNECTED : NetworkStatus.DISCONNECTED,
    transportType: path.interfaceType,
  };
}

function initialState(): ConnectivityState {
  return {
    isConnected: true,
    status: NetworkStatus.CONNECTED,
    transportType: NetworkType.UNKNOWN,
  };
}

function sameState(a: ConnectivityState, b: ConnectivityState): boolean {
  return a.isConnected === b.isConnected && a.transportType === b.transportType;
}

export class NetworkReachability {
  private readonly observer: IPathObserver;
  private readonly debounceMs: number;
  private readonly logger: ILogger;
  private readonly listeners = new Set<ConnectivityListener>();

  // Optimistic until the observer reports a path
  private state: ConnectivityState = initialState();
  private published: ConnectivityState = this.state;
  private debounceTimer?: NodeJS.Timeout;
  private monitoring = false;

  constructor(options: NetworkReachabilityOptions = {}) {
    this.observer = options.observer ?? new InterfacePathObserver();
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = options.logger || LoggerFactory.getLogger("NetworkReachability");
  }

  isConnected(): boolean {
    this.ensureMonitoring();
    return this.state.isConnected;
  }

  status(): NetworkStatus {
    this.ensureMonitoring();
    return this.state.status;
  }

  currentTransportType(): NetworkType {
    this.ensureMonitoring();
    return this.state.transportType;
  }

  transportType(): NetworkType {
    return this.currentTransportType();
  }

  getState(): ConnectivityState {
    this.ensureMonitoring();
    return { ...this.state };
  }

  isMonitoring(): boolean {
    return this.monitoring;
  }

  /**
   * Register for settled connectivity changes
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: ConnectivityListener): () => void {
    this.ensureMonitoring();
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Release the path observer. Monitoring restarts on next use, and the
   * restart's first path is compared against what subscribers last heard.
   */
  stopMonitoring(): void {
    if (!this.monitoring) return;
    this.observer.cancel();
    this.monitoring = false;
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
    this.state = initialState();
    this.logger.info("Stopped network monitoring");
  }

  private ensureMonitoring(): void {
    if (this.monitoring) return;
    this.monitoring = true;
    this.observer.start((path) => this.handlePath(path));
    this.logger.debug("Started network monitoring");
  }

  private handlePath(path: NetworkPath): void {
    const next = stateFromPath(path);
    if (sameState(this.state, next)) return;

    this.state = next;
    this.logger.info(`Network ${next.status} (${next.transportType})`);
    this.schedulePublish();
  }

  private schedulePublish(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      this.publish();
    }, this.debounceMs);
    this.debounceTimer.unref();
  }

  private publish(): void {
    if (sameState(this.published, this.state)) return;
    this.published = this.state;

    const snapshot = { ...this.state };
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error("Connectivity listener threw", error);
      }
    }
  }
}
