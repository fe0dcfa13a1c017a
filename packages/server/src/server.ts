/**
 * MCP server for orbitrag
 * Exposes a retrieval session via tools; one session per server process
 *
 * Protocol: Model Context Protocol (MCP)
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { OrbitragError } from "@orbitrag/sdk";
import { createToolHandlers, isToolName, toolDefinitions } from "./tools.js";
import { SessionService, type SessionServiceOptions } from "./service/session.js";
import { errorCode, logger } from "./observability/logger.js";

export const SERVER_NAME = "orbitrag-server";
export const SERVER_VERSION = "0.1.0";

/**
 * Map tool errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof OrbitragError) {
    switch (error.code) {
      case "E_NOT_INITIALIZED":
        return { code: ErrorCode.InvalidRequest, message: error.message };
      case "E_CONFIG":
      case "E_INVALID_OPTION":
        return { code: ErrorCode.InvalidParams, message: error.message };
      default:
        return { code: ErrorCode.InternalError, message: error.message };
    }
  }

  if (error instanceof Error) {
    if (errorCode(error) === "ETIMEDOUT") {
      return {
        code: ErrorCode.RequestTimeout,
        message: error.message,
      };
    }

    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  // Unknown error type
  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}

/**
 * Create and configure the MCP server; the caller connects a transport
 */
export function createServer(options: SessionServiceOptions = {}): Server {
  const service = new SessionService(options);
  const handlers = createToolHandlers(service);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      return await handlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
