/**
 * Environment configuration for the network client
 */

import dotenv from "dotenv";
import { z } from "zod";
import { LogLevel } from "../core/interfaces/ILogger.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const milliseconds = z.coerce.number().int().nonnegative();

const EnvironmentSchema = z.object({
  NETWORK_DEBUG: booleanFlag.default("false"),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.nativeEnum(LogLevel))
    .default(LogLevel.INFO),
  REQUEST_TIMEOUT_MS: milliseconds.default(0),
  CONNECTIVITY_POLL_INTERVAL_MS: milliseconds.min(1).default(2000),
  CONNECTIVITY_DEBOUNCE_MS: milliseconds.default(300),
});

export interface NetworkConfig {
  debugMode: boolean;
  logLevel: LogLevel;
  /** 0 leaves the transport without a timeout */
  requestTimeoutMs: number;
  pollIntervalMs: number;
  debounceMs: number;
}

/**
 * Read and validate configuration.
 *
 * Without an explicit env, a .env file in the working directory is loaded
 * into process.env first.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env?: NodeJS.ProcessEnv): NetworkConfig {
  let source = env;
  if (!source) {
    dotenv.config();
    source = process.env;
  }

  const result = EnvironmentSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid network configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    debugMode: parsed.NETWORK_DEBUG,
    logLevel: parsed.LOG_LEVEL,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    pollIntervalMs: parsed.CONNECTIVITY_POLL_INTERVAL_MS,
    debounceMs: parsed.CONNECTIVITY_DEBOUNCE_MS,
  };
}
