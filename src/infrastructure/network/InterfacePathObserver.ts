/**
 * Path observer backed by the host's network interface table
 */

import { networkInterfaces, NetworkInterfaceInfo } from "os";
import {
  IPathObserver,
  PathUpdateHandler,
} from "../../core/interfaces/IPathObserver.js";
import { ILogger } from "../../core/interfaces/ILogger.js";
import { NetworkPath, NetworkType } from "../../types/network.types.js";
import { LoggerFactory } from "../logging/LoggerFactory.js";

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface InterfacePathObserverOptions {
  /** Poll period in milliseconds */
  pollIntervalMs?: number;
  /** Source of the interface table; defaults to os.networkInterfaces */
  readInterfaces?: () => InterfaceTable;
  logger?: ILogger;
}

export const DEFAULT_POLL_INTERVAL_MS = 2000;

const INTERFACE_PATTERNS: ReadonlyArray<[RegExp, NetworkType]> = [
  [/^(wl|wlan|wifi|wi-fi)/i, NetworkType.WIFI],
  [/^(wwan|ppp|rmnet|pdp_ip|ccmni)/i, NetworkType.CELLULAR],
  [/^(eth|en|em|ethernet)/i, NetworkType.WIRED],
];

/**
 * Classify an interface by its OS name, e.g. wlan0, eth0, rmnet_data0
 */
export function classifyInterface(name: string): NetworkType {
  for (const [pattern, type] of INTERFACE_PATTERNS) {
    if (pattern.test(name)) {
      return type;
    }
  }
  return NetworkType.OTHER;
}

/**
 * Derive the network path from an interface table. The first non-internal
 * interface with an address carries the path.
 */
export function pathFromInterfaces(table: InterfaceTable): NetworkPath {
  for (const [name, addresses] of Object.entries(table)) {
    if (addresses?.some((address) => !address.internal)) {
      return { status: "satisfied", interfaceType: classifyInterface(name) };
    }
  }
  return { status: "unsatisfied", interfaceType: NetworkType.OTHER };
}

function samePath(a: NetworkPath | undefined, b: NetworkPath): boolean {
  return a?.status === b.status && a.interfaceType === b.interfaceType;
}

export class InterfacePathObserver implements IPathObserver {
  private readonly pollIntervalMs: number;
  private readonly readInterfaces: () => InterfaceTable;
  private readonly logger: ILogger;
  private timer?: NodeJS.Timeout;
  private lastPath?: NetworkPath;

  constructor(options: InterfacePathObserverOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.readInterfaces = options.readInterfaces ?? networkInterfaces;
    this.logger =
      options.logger || LoggerFactory.getLogger("InterfacePathObserver");
  }

  start(handler: PathUpdateHandler): void {
    this.cancel();

    const poll = () => {
      const path = this.readPath();
      if (path && !samePath(this.lastPath, path)) {
        this.lastPath = path;
        handler(path);
      }
    };

    poll();
    this.timer = setInterval(poll, this.pollIntervalMs);
    this.timer.unref();
  }

  cancel(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.lastPath = undefined;
  }

  private readPath(): NetworkPath | undefined {
    try {
      return pathFromInterfaces(this.readInterfaces());
    } catch (error) {
      this.logger.warning("Unable to read network interfaces", {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
