/**
 * Unit tests for the logger
 */

import { describe, it, expect } from "vitest";
import { captureLogs } from "@orbitrag/testkit";
import { Logger, parseLogThreshold } from "./logs.js";

describe("Logger", () => {
  it("should format level, event, message and details", () => {
    const lines: string[] = [];
    const logger = new Logger("debug", (line) => lines.push(line));

    logger.info("store.document", { message: "stored", details: { chunks: 1 } });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\S+\] \[INFO\] \[store\.document\] stored \{"chunks":1\}$/);
  });

  it("should drop entries below the threshold", () => {
    const lines: string[] = [];
    const logger = new Logger("warn", (line) => lines.push(line));

    logger.debug("index.update");
    logger.info("retrieve.scored");
    logger.warn("completion.status");

    expect(lines).toHaveLength(1);
    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("error")).toBe(true);
  });

  it("should write nothing when silent", () => {
    const lines: string[] = [];
    const logger = new Logger("silent", (line) => lines.push(line));
    logger.error("completion.error");
    expect(lines).toEqual([]);
  });
});

describe("parseLogThreshold", () => {
  it("should accept known names in any case", () => {
    expect(parseLogThreshold(" DEBUG ")).toBe("debug");
    expect(parseLogThreshold("silent")).toBe("silent");
  });

  it("should ignore unknown or missing names", () => {
    expect(parseLogThreshold("verbose")).toBeUndefined();
    expect(parseLogThreshold(undefined)).toBeUndefined();
    expect(parseLogThreshold("toString")).toBeUndefined();
  });
});

describe("captureLogs", () => {
  it("should collect lines and put back the previous threshold and sink", () => {
    const original: string[] = [];
    const sink = (line: string) => {
      original.push(line);
    };
    const logger = new Logger("error", sink);

    const capture = captureLogs(logger, "info");
    logger.info("store.document");
    logger.debug("index.update");
    capture.restore();
    logger.info("retrieve.scored");
    logger.error("completion.error");

    expect(capture.lines).toHaveLength(1);
    expect(capture.events("store.document")).toHaveLength(1);
    expect(capture.events("index.update")).toEqual([]);
    expect(logger.threshold).toBe("error");
    expect(logger.sink).toBe(sink);
    expect(original).toHaveLength(1);
    expect(original[0]).toContain("[completion.error]");
  });
});
