/**
 * MCP tool implementations for orbitrag
 * Every tool answers with MCP text content: a one-line summary, then JSON
 */

import {
  COMPLETION_ERROR_PREFIX,
  NotInitializedError,
  ask,
  isErrorResult,
  load,
  stats,
} from "@orbitrag/sdk";
import {
  AskInputSchema,
  InitInputSchema,
  LoadInputSchema,
  ResetInputSchema,
  SearchInputSchema,
  StatsInputSchema,
} from "./schemas.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { SessionService } from "./service/session.js";
import { errorCode, logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export type ToolName = "init" | "load" | "ask" | "search" | "stats" | "reset";

/** Headroom over the completion timeout before an ask call is abandoned */
const ASK_TIMEOUT_SLACK_MS = 5000;

// Helper to wrap tool execution with timeout, logging, and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new ToolTimeoutError(toolName, timeoutMs));
      }, timeoutMs);
    });

    // Race between handler and timeout
    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errorCode(error));
  }
}

/**
 * Raised when a tool handler outlives its budget
 */
export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(tool: string, timeoutMs: number) {
    super(`Tool ${tool} execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

function textResult(summary: string, data?: unknown): ToolResult {
  const content: ToolResult["content"] = [{ type: "text", text: summary }];
  if (data !== undefined) {
    content.push({ type: "text", text: JSON.stringify(data) });
  }
  return { content };
}

/**
 * Build the handlers for one server's session service
 */
export function createToolHandlers(service: SessionService): Record<ToolName, ToolHandler> {
  return {
    /**
     * init: Start a fresh session, replacing any previous one
     */
    init: async (args) => {
      const input = InitInputSchema.parse(args ?? {});

      return executeTool("init", 2000, async () => {
        const { success, model, declaredStateCount } = service.init(input);
        return textResult(`Initialized ${model} with ${declaredStateCount} declared states`, {
          success,
          model,
          declaredStateCount,
        });
      });
    },

    /**
     * load: Chunk, encode and index a document
     */
    load: async (args) => {
      const { text } = LoadInputSchema.parse(args);

      return executeTool("load", 10000, async () => {
        const result = load(service.session, text);
        if (isErrorResult(result)) {
          throw new NotInitializedError();
        }
        return textResult(
          `Loaded ${result.chunks} chunks (ratio ${result.compressionRatio}, ${result.indexedKeywords} keywords)`,
          result
        );
      });
    },

    /**
     * ask: Answer a question with retrieved context
     */
    ask: async (args) => {
      const { question, topK, useMemory } = AskInputSchema.parse(args);
      const session = service.require();

      return executeTool("ask", session.client.timeoutMs + ASK_TIMEOUT_SLACK_MS, async () => {
        const answer = useMemory
          ? await ask(session, question, topK)
          : await session.ask(question, { useMemory: false });

        if (answer.startsWith(COMPLETION_ERROR_PREFIX)) {
          return { ...textResult(answer), isError: true };
        }
        return textResult(answer);
      });
    },

    /**
     * search: Retrieved context only, without calling the endpoint
     */
    search: async (args) => {
      const { query, topK } = SearchInputSchema.parse(args);
      const session = service.require();

      return executeTool("search", 2000, async () => {
        const { hits, fallback } = session.retriever.rank(query, topK);
        const context = session.search(query, topK);
        return textResult(
          fallback ? `No keyword match; ${hits.length} fragments in store order` : `Found ${hits.length} fragments`,
          { fallback, hits, context }
        );
      });
    },

    /**
     * stats: Session statistics
     */
    stats: async (args) => {
      StatsInputSchema.parse(args ?? {});

      return executeTool("stats", 2000, async () => {
        const result = stats(service.session);
        if (isErrorResult(result)) {
          throw new NotInitializedError();
        }
        return textResult(
          `${result.chunks} chunks, ${result.indexedKeywords} keywords, ${result.statesPerUnit} states per unit`,
          result
        );
      });
    },

    /**
     * reset: Drop the current session
     */
    reset: async (args) => {
      ResetInputSchema.parse(args ?? {});

      return executeTool("reset", 2000, async () => {
        const existed = service.reset();
        return textResult(existed ? "Session dropped" : "No session to drop", { ok: true, existed });
      });
    },
  };
}

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "init",
    description:
      "Start a fresh retrieval session (replaces any existing one). Unset fields fall back to ORBITRAG_* environment variables",
    inputSchema: {
      type: "object",
      properties: {
        endpoint: {
          type: "string",
          description: "Completion endpoint URL (default http://localhost:11434/api/chat)",
        },
        apiKey: {
          type: "string",
          description: "Bearer credential; leave empty for local endpoints",
        },
        model: {
          type: "string",
          description: "Model name (default llama3.2)",
        },
        level: {
          type: "number",
          description: "State bank level, 1-50 (default 15)",
        },
        timeoutMs: {
          type: "number",
          description: "Completion timeout in milliseconds (default 30000)",
        },
      },
    },
  },
  {
    name: "load",
    description: "Chunk a document into 200-word fragments, encode and index them",
    inputSchema: {
      type: "object",
      properties: {
        text: {
          type: "string",
          description: "Document text",
        },
      },
      required: ["text"],
    },
  },
  {
    name: "ask",
    description: "Answer a question using the top matching fragments as context",
    inputSchema: {
      type: "object",
      properties: {
        question: {
          type: "string",
          description: "Question to answer",
        },
        topK: {
          type: "number",
          description: "Fragments placed in the prompt (default 8, max 1000)",
        },
        useMemory: {
          type: "boolean",
          description: "Set false to send the bare question without retrieval",
        },
      },
      required: ["question"],
    },
  },
  {
    name: "search",
    description: "Return the context retrieved for a query without calling the model",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Query text",
        },
        topK: {
          type: "number",
          description: "Fragments to return (default 8, max 1000)",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "stats",
    description: "Chunk, unit and keyword counts of the current session",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "reset",
    description: "Drop the current session",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

export function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((definition) => definition.name === name);
}
