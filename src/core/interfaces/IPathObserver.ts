/**
 * Path Observer Interface
 * Abstraction over the platform facility reporting network path changes
 */

import { NetworkPath } from "../../types/network.types.js";

export type PathUpdateHandler = (path: NetworkPath) => void;

export interface IPathObserver {
  /**
   * Begin observing. The handler receives the current path as soon as it is
   * known and again on every change.
   */
  start(handler: PathUpdateHandler): void;

  /**
   * Stop observing and release platform resources
   */
  cancel(): void;
}
