/**
 * Session service
 * Holds the one session of a server process and resolves init settings
 */

import {
  DEFAULT_ENDPOINT,
  DEFAULT_LEVEL,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  NotInitializedError,
  configFromEnv,
  init,
  type InitResult,
  type Session,
  type SessionOptions,
} from "@orbitrag/sdk";
import type { InitInput } from "../schemas.js";
import { logger } from "../observability/logger.js";

export interface SessionServiceOptions {
  /** Source of ORBITRAG_* defaults (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** HTTP client handed to every session */
  http?: SessionOptions["http"];
}

export class SessionService {
  #session: Session | undefined;
  #env: NodeJS.ProcessEnv;
  #http: SessionOptions["http"];

  constructor(options: SessionServiceOptions = {}) {
    this.#env = options.env ?? process.env;
    this.#http = options.http;
  }

  /**
   * Current session, if init has run
   */
  get session(): Session | undefined {
    return this.#session;
  }

  /**
   * Replace the current session with a fresh one
   * Tool arguments take precedence over ORBITRAG_* variables
   * @throws {InvalidConfigurationError} If an environment default is malformed
   */
  init(input: InitInput): InitResult<Session> {
    const fromEnv = configFromEnv(this.#env);
    const result = init({
      endpoint: input.endpoint ?? fromEnv.endpoint ?? DEFAULT_ENDPOINT,
      apiKey: input.apiKey ?? fromEnv.apiKey ?? "",
      model: input.model ?? fromEnv.model ?? DEFAULT_MODEL,
      level: input.level ?? fromEnv.level ?? DEFAULT_LEVEL,
      timeoutMs: input.timeoutMs ?? fromEnv.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      http: this.#http,
    });

    const replaced = this.#session !== undefined;
    this.#session = result.session;
    logger.info("service.init", {
      model: result.model,
      endpoint: result.session.client.endpoint,
      level: result.session.store.level,
      replaced,
    });
    return result;
  }

  /**
   * The current session
   * @throws {NotInitializedError} If init has not run
   */
  require(): Session {
    if (!this.#session) {
      throw new NotInitializedError();
    }
    return this.#session;
  }

  /**
   * Drop the current session
   * @returns Whether a session existed
   */
  reset(): boolean {
    const existed = this.#session !== undefined;
    this.#session = undefined;
    logger.info("service.reset", { existed });
    return existed;
  }
}
