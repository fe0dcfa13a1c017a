/**
 * Argument validation helpers
 */

import { InvalidConfigurationError, InvalidOptionError } from "./errors.js";
import { MAX_LEVEL } from "./config.js";

/**
 * Validate a state bank level
 * @throws {InvalidConfigurationError} If level is not an integer in 1..MAX_LEVEL
 */
export function validateLevel(level: number): void {
  if (!Number.isInteger(level) || level <= 0) {
    throw new InvalidConfigurationError("level", `must be a positive integer, got ${String(level)}`);
  }
  if (level > MAX_LEVEL) {
    throw new InvalidConfigurationError("level", `must be at most ${MAX_LEVEL}, got ${level}`);
  }
}

/**
 * Validate a positive integer option (chunk sizes, timeouts)
 * @throws {InvalidOptionError} If value is not a positive integer
 */
export function validatePositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidOptionError(name, `must be a positive integer, got ${String(value)}`);
  }
}

/**
 * Validate a non-negative integer option (topK)
 * @throws {InvalidOptionError} If value is negative or not an integer
 */
export function validateNonNegativeInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOptionError(name, `must be a non-negative integer, got ${String(value)}`);
  }
}

/**
 * Convert an encodable value to bigint
 * @throws {InvalidOptionError} If value is negative, fractional or an unsafe number
 */
export function toEncodableValue(value: bigint | number): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidOptionError("value", `must be a safe integer or a bigint, got ${value}`);
    }
    value = BigInt(value);
  }
  if (value < 0n) {
    throw new InvalidOptionError("value", "must be non-negative");
  }
  return value;
}

/**
 * Validate a propagation time step
 * @throws {InvalidOptionError} If dt is not a finite number
 */
export function validateTimeStep(dt: number): void {
  if (!Number.isFinite(dt)) {
    throw new InvalidOptionError("dt", `must be a finite number, got ${String(dt)}`);
  }
}
