/**
 * Logger Factory
 * Creates logger instances with service names
 */

import { LogLevel } from "../../core/interfaces/ILogger.js";
import { ConsoleLogger } from "./ConsoleLogger.js";

export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static level: LogLevel = LogLevel.INFO;

  /**
   * Get or create a logger for a specific service/module
   */
  static getLogger(serviceName: string): ConsoleLogger {
    let logger = this.loggers.get(serviceName);
    if (!logger) {
      logger = new ConsoleLogger(serviceName, this.level);
      this.loggers.set(serviceName, logger);
    }
    return logger;
  }

  /**
   * Create a new logger instance (doesn't cache)
   */
  static createLogger(serviceName: string): ConsoleLogger {
    return new ConsoleLogger(serviceName, this.level);
  }

  /**
   * Set the minimum level for every cached logger and all future ones
   */
  static setLevel(level: LogLevel): void {
    this.level = level;
    for (const logger of this.loggers.values()) {
      logger.setLevel(level);
    }
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Clear all cached loggers (useful for testing)
   */
  static clearCache(): void {
    this.loggers.clear();
  }
}
