/**
 * Unit tests for CompletionClient against an in-process endpoint
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createFakeEndpoint,
  jsonReply,
  textReply,
  timeoutResponder,
} from "@orbitrag/testkit";
import { CompletionClient } from "./client.js";
import { CompletionTransportError, InvalidOptionError } from "../errors.js";
import { metrics } from "../observability/metrics.js";

const ENDPOINT = "http://localhost:11434/api/chat";

describe("CompletionClient", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should post a chat request", async () => {
    const fake = createFakeEndpoint(() => jsonReply({ response: "ok" }));
    const client = new CompletionClient({
      endpoint: ENDPOINT,
      apiKey: "",
      model: "test-model",
      http: fake.http,
    });

    await client.complete("hello");

    expect(fake.requests).toHaveLength(1);
    const [request] = fake.requests;
    expect(request?.method).toBe("POST");
    expect(request?.url).toBe(ENDPOINT);
    expect(request?.timeout).toBe(30_000);
    expect(request?.body).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.3,
      max_tokens: 500,
    });
    expect(request?.headers["authorization"]).toBeUndefined();
  });

  it("should send a bearer credential when a key is set", async () => {
    const fake = createFakeEndpoint(() => jsonReply({ response: "ok" }));
    const client = new CompletionClient({
      endpoint: ENDPOINT,
      apiKey: "test-secret",
      model: "test-model",
      timeoutMs: 5000,
      http: fake.http,
    });

    await client.complete("hello");

    expect(fake.requests[0]?.headers["authorization"]).toBe("Bearer test-secret");
    expect(fake.requests[0]?.timeout).toBe(5000);
  });

  it("should extract the answer text", async () => {
    const fake = createFakeEndpoint(() => jsonReply({ choices: [{ message: { content: "X" } }] }));
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });
    await expect(client.answer("q")).resolves.toBe("X");
  });

  it("should accept a JSON body with an error status", async () => {
    const fake = createFakeEndpoint(() => jsonReply({ error: "model not found" }, 404));
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });
    await expect(client.answer("q")).resolves.toBe('{"error":"model not found"}');
  });

  it("should strip a byte order mark", async () => {
    const fake = createFakeEndpoint(() => textReply('\uFEFF{"response":"Y"}'));
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });
    await expect(client.answer("q")).resolves.toBe("Y");
  });

  it("should fail on a non-JSON body", async () => {
    const fake = createFakeEndpoint(() => textReply("<html>bad gateway</html>", 502));
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });

    const error = await client.complete("q").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CompletionTransportError);
    expect(error).toMatchObject({ code: "E_TRANSPORT", endpoint: ENDPOINT });
    expect(String(error)).toContain("Invalid JSON response:");
  });

  it("should wrap timeouts", async () => {
    const fake = createFakeEndpoint(timeoutResponder());
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });

    await expect(client.answer("q")).rejects.toThrow(
      new CompletionTransportError(ENDPOINT, "timeout of 30000ms exceeded")
    );
    expect(metrics.getMetrics().completionErrorCount).toBe(1);
  });

  it("should record successful completions", async () => {
    const fake = createFakeEndpoint(() => jsonReply({ response: "ok" }));
    const client = new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", http: fake.http });
    await client.complete("q");
    expect(metrics.getMetrics()).toMatchObject({ completionCount: 1, completionErrorCount: 0 });
  });

  it("should reject a non-positive timeout", () => {
    expect(
      () => new CompletionClient({ endpoint: ENDPOINT, apiKey: "", model: "m", timeoutMs: 0 })
    ).toThrow(InvalidOptionError);
  });
});
