#!/usr/bin/env node

/**
 * stdio entry point for the orbitrag MCP server
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  if (process.env.ORBITRAG_MCP_ENABLED === "false") {
    console.error("orbitrag MCP server is disabled (ORBITRAG_MCP_ENABLED=false)");
    return;
  }

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", { transport: "stdio" });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
