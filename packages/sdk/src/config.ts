/**
 * Default settings shared by the SDK, the CLI and the server
 */

import { InvalidConfigurationError } from "./errors.js";

/** Default level; 15 gives 1240 slots per unit */
export const DEFAULT_LEVEL = 15;

/** Highest accepted level; 50 already gives 42925 slots per unit */
export const MAX_LEVEL = 50;

/** Words per fragment when splitting a document */
export const DEFAULT_CHUNK_SIZE = 200;

/** Fragments returned by retrieval */
export const DEFAULT_TOP_K = 8;

/** Propagation step applied to every freshly encoded unit */
export const DEFAULT_TIME_STEP = 0.01;

/** Scalar applied to slot energy during propagation */
export const DEFAULT_FIELD_STRENGTH = 1.0;

/** Upper bound for one completion request */
export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_TEMPERATURE = 0.3;

export const DEFAULT_MAX_TOKENS = 500;

/** Length of the content-derived fragment id (hex characters) */
export const FRAGMENT_ID_LENGTH = 8;

/** Literal reported for integrity; propagation cannot alter occupied state */
export const INTEGRITY_LABEL = "100%";

/** Local Ollama chat endpoint */
export const DEFAULT_ENDPOINT = "http://localhost:11434/api/chat";

export const DEFAULT_MODEL = "llama3.2";

/**
 * Settings that can come from the environment
 */
export interface EnvironmentConfig {
  endpoint?: string;
  apiKey?: string;
  model?: string;
  level?: number;
  timeoutMs?: number;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = readString(env, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new InvalidConfigurationError(name, `must be a positive integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Read ORBITRAG_ENDPOINT, ORBITRAG_API_KEY, ORBITRAG_MODEL, ORBITRAG_LEVEL and
 * ORBITRAG_TIMEOUT_MS; unset or blank variables are left out
 * @throws {InvalidConfigurationError} If a numeric variable is malformed or the level exceeds MAX_LEVEL
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const config: EnvironmentConfig = {};
  const endpoint = readString(env, "ORBITRAG_ENDPOINT");
  if (endpoint !== undefined) config.endpoint = endpoint;
  const apiKey = readString(env, "ORBITRAG_API_KEY");
  if (apiKey !== undefined) config.apiKey = apiKey;
  const model = readString(env, "ORBITRAG_MODEL");
  if (model !== undefined) config.model = model;
  const level = readPositiveInt(env, "ORBITRAG_LEVEL");
  if (level !== undefined && level > MAX_LEVEL) {
    throw new InvalidConfigurationError(
      "ORBITRAG_LEVEL",
      `must be at most ${MAX_LEVEL}, got "${level}"`
    );
  }
  if (level !== undefined) config.level = level;
  const timeoutMs = readPositiveInt(env, "ORBITRAG_TIMEOUT_MS");
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;
  return config;
}
