/**
 * Environment and configuration resolution
 */

import { DEFAULT_ENDPOINT, DEFAULT_LEVEL, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS, configFromEnv } from "@orbitrag/sdk";

/**
 * Connection and store settings given on the command line
 */
export interface ConfigOverrides {
  endpoint?: string;
  apiKey?: string;
  model?: string;
  level?: number;
  timeout?: number;
}

export interface CliConfig {
  endpoint: string;
  apiKey: string;
  model: string;
  level: number;
  timeoutMs: number;
}

/**
 * Resolve session settings
 * Priority: CLI option > ORBITRAG_* env var > default
 * @throws {InvalidConfigurationError} If a numeric env var is malformed
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const fromEnv = configFromEnv(env);
  return {
    endpoint: overrides.endpoint ?? fromEnv.endpoint ?? DEFAULT_ENDPOINT,
    apiKey: overrides.apiKey ?? fromEnv.apiKey ?? "",
    model: overrides.model ?? fromEnv.model ?? DEFAULT_MODEL,
    level: overrides.level ?? fromEnv.level ?? DEFAULT_LEVEL,
    timeoutMs: overrides.timeout ?? fromEnv.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.ORBITRAG_CLI_DEBUG === "1";
}
