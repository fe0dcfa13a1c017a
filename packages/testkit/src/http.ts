/**
 * In-process completion endpoint for tests
 *
 * Builds an axios instance whose adapter never touches the network. Each call
 * is recorded, then answered by a responder function.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from "axios";

/**
 * A request as seen by the endpoint
 */
export interface CapturedRequest {
  method: string;
  url: string;
  /** Header names lowercased */
  headers: Record<string, string>;
  /** Parsed JSON body, or the raw string when it is not JSON */
  body: unknown;
  timeout: number | undefined;
}

/**
 * What the endpoint answers with
 */
export interface FakeReply {
  status?: number;
  /** Sent verbatim when a string, JSON-serialized otherwise */
  body: unknown;
}

export type Responder = (request: CapturedRequest) => FakeReply | Promise<FakeReply>;

export interface FakeEndpoint {
  http: AxiosInstance;
  requests: CapturedRequest[];
}

/**
 * Reply with a JSON body
 */
export function jsonReply(data: unknown, status = 200): FakeReply {
  return { status, body: JSON.stringify(data) };
}

/**
 * Reply with a raw text body
 */
export function textReply(text: string, status = 200): FakeReply {
  return { status, body: text };
}

/**
 * Responder that fails the way axios reports a timeout
 */
export function timeoutResponder(timeoutMs = 30_000): Responder {
  return () => {
    throw new AxiosError(`timeout of ${timeoutMs}ms exceeded`, AxiosError.ECONNABORTED);
  };
}

/**
 * Responder that fails the way axios reports a refused connection
 */
export function refusedResponder(endpoint = "http://localhost:11434/api/chat"): Responder {
  return () => {
    throw new AxiosError(`connect ECONNREFUSED ${new URL(endpoint).host}`, "ECONNREFUSED");
  };
}

function parseBody(data: unknown): unknown {
  if (typeof data !== "string") return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

function capture(config: InternalAxiosRequestConfig): CapturedRequest {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON(true))) {
    if (value !== undefined && value !== null) {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return {
    method: (config.method ?? "get").toUpperCase(),
    url: config.url ?? "",
    headers,
    body: parseBody(config.data),
    timeout: config.timeout,
  };
}

/**
 * Create a fake completion endpoint
 * @param responder - Answers each request; may throw to simulate a transport failure
 */
export function createFakeEndpoint(responder: Responder): FakeEndpoint {
  const requests: CapturedRequest[] = [];

  const http = axios.create({
    adapter: async (config) => {
      const request = capture(config);
      requests.push(request);
      const reply = await responder(request);
      return {
        data: typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body),
        status: reply.status ?? 200,
        statusText: "",
        headers: { "content-type": "application/json" },
        config,
      };
    },
  });

  return { http, requests };
}
