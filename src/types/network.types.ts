/**
 * Connectivity type definitions
 */

export enum NetworkStatus {
  CONNECTED = "connected",
  DISCONNECTED = "disconnected",
}

export enum NetworkType {
  WIFI = "wifi",
  CELLULAR = "cellular",
  WIRED = "wired",
  OTHER = "other",
  UNKNOWN = "unknown",
}

export type PathStatus = "satisfied" | "unsatisfied";

/**
 * A snapshot of the network path reported by a path observer
 */
export interface NetworkPath {
  status: PathStatus;
  /** Interface carrying traffic; UNKNOWN when the platform cannot tell */
  interfaceType: NetworkType;
}

export interface ConnectivityState {
  isConnected: boolean;
  status: NetworkStatus;
  transportType: NetworkType;
}

export type ConnectivityListener = (state: ConnectivityState) => void;
