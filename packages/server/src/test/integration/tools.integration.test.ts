/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a fake completion endpoint
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createFakeEndpoint,
  jsonReply,
  refusedResponder,
  type FakeEndpoint,
  type Responder,
} from "@orbitrag/testkit";
import { InvalidConfigurationError, NotInitializedError, buildPrompt, fragmentId } from "@orbitrag/sdk";
import { ZodError } from "zod";
import { createToolHandlers, executeTool, ToolTimeoutError, type ToolResult } from "../../tools.js";
import { SessionService } from "../../service/session.js";
import { metrics } from "../../observability/metrics.js";
import { InitOutputSchema, LoadOutputSchema, StatsOutputSchema } from "../../schemas.js";

const FOX = "the quick brown fox jumps over the lazy dog";

let fake: FakeEndpoint;

function setup(responder: Responder, env: NodeJS.ProcessEnv = {}) {
  fake = createFakeEndpoint(responder);
  const service = new SessionService({ env, http: fake.http });
  return { service, tools: createToolHandlers(service) };
}

function jsonOf(result: ToolResult): unknown {
  return JSON.parse(result.content[1]?.text ?? "null");
}

beforeEach(() => {
  metrics.reset();
});

describe("Tool integration tests", () => {
  describe("init", () => {
    it("should start a session with defaults", async () => {
      const { tools, service } = setup(() => jsonReply({}));

      const result = await tools.init({});

      expect(result.content[0]?.text).toBe("Initialized llama3.2 with 1240 declared states");
      expect(InitOutputSchema.parse(jsonOf(result))).toEqual({
        success: true,
        model: "llama3.2",
        declaredStateCount: 1240,
      });
      expect(service.session?.client.endpoint).toBe("http://localhost:11434/api/chat");
    });

    it("should accept undefined arguments", async () => {
      const { tools } = setup(() => jsonReply({}));
      await expect(tools.init(undefined)).resolves.toMatchObject({ content: expect.any(Array) });
    });

    it("should prefer arguments over environment over defaults", async () => {
      const { tools, service } = setup(() => jsonReply({}), {
        ORBITRAG_MODEL: "env-model",
        ORBITRAG_LEVEL: "3",
      });

      await tools.init({});
      expect(service.session?.model).toBe("env-model");
      expect(service.session?.store.level).toBe(3);

      await tools.init({ model: "arg-model" });
      expect(service.session?.model).toBe("arg-model");
    });

    it("should replace the previous session", async () => {
      const { tools } = setup(() => jsonReply({}));
      await tools.init({});
      await tools.load({ text: FOX });

      await tools.init({});

      expect(jsonOf(await tools.stats({}))).toMatchObject({ chunks: 0, indexedKeywords: 0 });
    });

    it("should surface malformed environment settings", async () => {
      const { tools } = setup(() => jsonReply({}), { ORBITRAG_TIMEOUT_MS: "soon" });
      await expect(tools.init({})).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("should refuse an environment level above 50", async () => {
      const { tools, service } = setup(() => jsonReply({}), { ORBITRAG_LEVEL: "5000" });

      await expect(tools.init({})).rejects.toThrow(
        'Invalid configuration for ORBITRAG_LEVEL: must be at most 50, got "5000"'
      );
      expect(service.session).toBeUndefined();
    });

    it("should reject invalid arguments", async () => {
      const { tools } = setup(() => jsonReply({}));
      await expect(tools.init({ level: 0 })).rejects.toBeInstanceOf(ZodError);
    });
  });

  describe("load and stats", () => {
    it("should report the stored document", async () => {
      const { tools } = setup(() => jsonReply({}));
      await tools.init({});

      const loaded = await tools.load({ text: FOX });

      expect(loaded.content[0]?.text).toBe("Loaded 1 chunks (ratio 0.19×, 5 keywords)");
      expect(LoadOutputSchema.parse(jsonOf(loaded))).toEqual({
        success: true,
        chunks: 1,
        compressionRatio: "0.19×",
        indexedKeywords: 5,
        integrity: "100%",
      });

      const stats = await tools.stats({});
      expect(stats.content[0]?.text).toBe("1 chunks, 5 keywords, 1240 states per unit");
      expect(StatsOutputSchema.parse(jsonOf(stats))).toEqual({
        chunks: 1,
        units: 1,
        indexedKeywords: 5,
        level: 15,
        statesPerUnit: 1240,
        integrity: "100%",
      });
    });

    it("should fail before init", async () => {
      const { tools } = setup(() => jsonReply({}));
      await expect(tools.load({ text: FOX })).rejects.toBeInstanceOf(NotInitializedError);
      await expect(tools.stats({})).rejects.toBeInstanceOf(NotInitializedError);
    });
  });

  describe("ask", () => {
    it("should send retrieved context to the endpoint", async () => {
      const { tools } = setup(() => jsonReply({ response: "It jumps." }));
      await tools.init({});
      await tools.load({ text: FOX });

      const result = await tools.ask({ question: "What does the brown fox do?" });

      expect(result).toEqual({ content: [{ type: "text", text: "It jumps." }] });
      expect(fake.requests[0]?.body).toMatchObject({
        model: "llama3.2",
        messages: [{ role: "user", content: buildPrompt("What does the brown fox do?", FOX) }],
      });
    });

    it("should send the bare question when memory is off", async () => {
      const { tools } = setup(() => jsonReply({ response: "hi" }));
      await tools.init({});
      await tools.load({ text: FOX });

      await tools.ask({ question: "hello there", useMemory: false });

      expect(fake.requests[0]?.body).toMatchObject({
        messages: [{ role: "user", content: "hello there" }],
      });
    });

    it("should send the bearer credential", async () => {
      const { tools } = setup(() => jsonReply({ response: "ok" }));
      await tools.init({ apiKey: "test-secret" });

      await tools.ask({ question: "anything" });

      expect(fake.requests[0]?.headers["authorization"]).toBe("Bearer test-secret");
    });

    it("should flag completion failures", async () => {
      const { tools } = setup(refusedResponder());
      await tools.init({});

      const result = await tools.ask({ question: "anything" });

      expect(result).toEqual({
        content: [{ type: "text", text: "ERROR calling LLM: connect ECONNREFUSED localhost:11434" }],
        isError: true,
      });
    });

    it("should fail before init", async () => {
      const { tools } = setup(() => jsonReply({}));
      await expect(tools.ask({ question: "anything" })).rejects.toBeInstanceOf(NotInitializedError);
      expect(fake.requests).toHaveLength(0);
    });
  });

  describe("search", () => {
    it("should return scored hits and context", async () => {
      const { tools } = setup(() => jsonReply({}));
      await tools.init({});
      await tools.load({ text: FOX });

      const result = await tools.search({ query: "brown fox" });

      expect(result.content[0]?.text).toBe("Found 1 fragments");
      expect(jsonOf(result)).toEqual({
        fallback: false,
        hits: [{ id: fragmentId(FOX), score: 1 }],
        context: FOX,
      });
      expect(fake.requests).toHaveLength(0);
    });

    it("should fall back to store order without a match", async () => {
      const { tools } = setup(() => jsonReply({}));
      await tools.init({});
      await tools.load({ text: FOX });

      const result = await tools.search({ query: "zebra" });

      expect(result.content[0]?.text).toBe("No keyword match; 1 fragments in store order");
      expect(jsonOf(result)).toEqual({
        fallback: true,
        hits: [{ id: fragmentId(FOX), score: 0 }],
        context: FOX,
      });
    });
  });

  describe("reset", () => {
    it("should drop the session", async () => {
      const { tools, service } = setup(() => jsonReply({}));
      await tools.init({});

      expect(jsonOf(await tools.reset({}))).toEqual({ ok: true, existed: true });
      expect(service.session).toBeUndefined();
      expect(jsonOf(await tools.reset({}))).toEqual({ ok: true, existed: false });
    });
  });

  describe("metrics", () => {
    it("should count calls and errors per tool", async () => {
      const { tools } = setup(() => jsonReply({}));
      await tools.init({});
      await expect(tools.load({ text: "" })).resolves.toBeDefined();
      await tools.reset({});
      await expect(tools.stats({})).rejects.toThrow();

      expect(metrics.getCounter("orbitrag.tool.calls_total", { tool: "init" })).toBe(1);
      expect(metrics.getCounter("orbitrag.tool.calls_total", { tool: "stats" })).toBe(1);
      expect(
        metrics.getCounter("orbitrag.tool.errors_total", { tool: "stats", err_code: "E_NOT_INITIALIZED" })
      ).toBe(1);
      expect(metrics.getHistogram("orbitrag.tool.latency_ms", { tool: "load" })?.count).toBe(1);
    });
  });
});

describe("executeTool", () => {
  it("should time out slow handlers", async () => {
    const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200));

    const error = await executeTool("slow", 10, slow).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ToolTimeoutError);
    expect(error).toMatchObject({ code: "ETIMEDOUT", message: "Tool slow execution timeout after 10ms" });
  });

  it("should pass results through", async () => {
    await expect(executeTool("fast", 1000, async () => 42)).resolves.toBe(42);
  });
});
