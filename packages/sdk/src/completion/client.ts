/**
 * HTTP client for the remote completion endpoint
 *
 * The request is a chat-style POST; the body is read as text and parsed here so
 * that any HTTP status with a JSON body is accepted, while a non-JSON body is a
 * transport failure.
 */

import axios, { type AxiosInstance } from "axios";
import type { CompletionOptions } from "../types.js";
import { CompletionTransportError, describeError } from "../errors.js";
import { validatePositiveInt } from "../validation.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "../config.js";
import { extractAnswer } from "./shapes.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";

export interface CompletionClientOptions extends CompletionOptions {
  /** Preconfigured axios instance (tests pass one with a stub adapter) */
  http?: AxiosInstance;
}

/**
 * Chat request body sent to the endpoint
 */
export interface CompletionRequest {
  model: string;
  messages: Array<{ role: "user"; content: string }>;
  temperature: number;
  max_tokens: number;
}

export class CompletionClient {
  readonly endpoint: string;
  readonly model: string;
  readonly timeoutMs: number;
  #apiKey: string;
  #temperature: number;
  #maxTokens: number;
  #http: AxiosInstance;

  /**
   * @throws {InvalidOptionError} If timeoutMs or maxTokens is not a positive integer
   */
  constructor(options: CompletionClientOptions) {
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    validatePositiveInt(this.timeoutMs, "timeoutMs");
    this.#apiKey = options.apiKey;
    this.#temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.#maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    validatePositiveInt(this.#maxTokens, "maxTokens");
    this.#http = options.http ?? axios.create();
  }

  buildRequest(prompt: string): CompletionRequest {
    return {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: this.#temperature,
      max_tokens: this.#maxTokens,
    };
  }

  #headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.#apiKey) {
      headers.Authorization = `Bearer ${this.#apiKey}`;
    }
    return headers;
  }

  /**
   * Send a prompt and return the parsed response body
   * @throws {CompletionTransportError} On network failure, timeout or a non-JSON body
   */
  async complete(prompt: string): Promise<unknown> {
    const startTime = performance.now();
    let success = false;

    try {
      const response = await this.#http.post<unknown>(this.endpoint, this.buildRequest(prompt), {
        headers: this.#headers(),
        timeout: this.timeoutMs,
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        logger.warn("completion.status", {
          details: { endpoint: this.endpoint, status: response.status },
        });
      }

      const body = parseBody(response.data, this.endpoint);
      success = true;
      return body;
    } catch (err) {
      if (err instanceof CompletionTransportError) {
        throw err;
      }
      throw new CompletionTransportError(this.endpoint, describeError(err), { cause: err });
    } finally {
      const duration = performance.now() - startTime;
      metrics.recordCompletion(duration, success);
      const data = {
        details: { endpoint: this.endpoint, model: this.model, durationMs: duration.toFixed(2) },
      };
      if (success) {
        logger.info("completion.success", data);
      } else {
        logger.error("completion.error", data);
      }
    }
  }

  /**
   * Send a prompt and extract the answer text from the response
   * @throws {CompletionTransportError} On transport failure
   * @throws {ResponseShapeError} If a recognized key has the wrong structure
   */
  async answer(prompt: string): Promise<string> {
    return extractAnswer(await this.complete(prompt));
  }
}

function parseBody(data: unknown, endpoint: string): unknown {
  if (typeof data !== "string") {
    return data;
  }
  try {
    // Strip BOM if present
    const cleaned = data.charCodeAt(0) === 0xfeff ? data.slice(1) : data;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CompletionTransportError(endpoint, `Invalid JSON response: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}
