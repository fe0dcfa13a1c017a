/**
 * Error types for orbitrag operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all orbitrag errors
 */
export abstract class OrbitragError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a store or unit is configured with an unusable level
 */
export class InvalidConfigurationError extends OrbitragError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly setting: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid configuration for ${setting}: ${reason}`, options);
  }
}

/**
 * Thrown when an operation receives an argument outside its domain
 */
export class InvalidOptionError extends OrbitragError {
  readonly code = "E_INVALID_OPTION";

  constructor(
    public readonly option: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${option}: ${reason}`, options);
  }
}

/**
 * Thrown by front ends when a session-bound operation runs before init
 */
export class NotInitializedError extends OrbitragError {
  readonly code = "E_NOT_INITIALIZED";

  constructor(options?: ErrorOptions) {
    super("Not initialized. Call init() first.", options);
  }
}

/**
 * Thrown when the completion endpoint cannot be reached or answers with a non-JSON body
 */
export class CompletionTransportError extends OrbitragError {
  readonly code = "E_TRANSPORT";

  constructor(
    public readonly endpoint: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(detail, options);
  }
}

/**
 * Thrown when a completion response carries a known key with an unexpected structure
 */
export class ResponseShapeError extends OrbitragError {
  readonly code = "E_RESPONSE_SHAPE";

  constructor(
    public readonly shape: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed "${shape}" response: ${reason}`, options);
  }
}

/**
 * One-line description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return (error.message || error.name || "Error").replace(/\s+/g, " ").trim();
  }
  if (error === null || error === undefined) {
    return "unknown error";
  }
  return String(error).replace(/\s+/g, " ").trim();
}
