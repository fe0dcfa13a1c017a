/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { MAX_LEVEL } from "@orbitrag/sdk";

/** Upper bound on counts given on the command line */
const MAX_COUNT = 10000;

function parseCount(value: string, name: string, min: number): number {
  const trimmed = value.trim();
  const kind = min === 0 ? "a non-negative" : "a positive";

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be ${kind} integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min) {
    throw new InvalidArgumentError(`${name} must be ${kind} integer`);
  }

  // Enforce reasonable max to prevent runaway prompts
  if (parsed > MAX_COUNT) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_COUNT}`);
  }

  return parsed;
}

/**
 * Parse a non-negative integer argument (--top-k)
 */
export function parseNonNegativeInt(value: string, name: string): number {
  return parseCount(value, name, 0);
}

/**
 * Parse a positive integer argument (--chunk-size)
 */
export function parsePositiveInt(value: string, name: string): number {
  return parseCount(value, name, 1);
}

/**
 * Parse a state bank level, capped at MAX_LEVEL
 */
export function parseLevel(value: string, name: string): number {
  const level = parseCount(value, name, 1);
  if (level > MAX_LEVEL) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_LEVEL}`);
  }
  return level;
}

/**
 * Parse a timeout in milliseconds; not capped like counts
 */
export function parseTimeout(value: string, name: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Validate an endpoint URL
 */
export function parseEndpoint(value: string, name: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidArgumentError(`${name} must be an absolute http(s) URL`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidArgumentError(`${name} must be an absolute http(s) URL`);
  }
  return value;
}
