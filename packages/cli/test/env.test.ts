/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "@orbitrag/sdk";
import { isVerbose, resolveConfig } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveConfig", () => {
    it("should use defaults when nothing is set", () => {
      expect(resolveConfig({}, {})).toEqual({
        endpoint: "http://localhost:11434/api/chat",
        apiKey: "",
        model: "llama3.2",
        level: 15,
        timeoutMs: 30000,
      });
    });

    it("should use ORBITRAG_* env vars when no option is given", () => {
      const env = {
        ORBITRAG_ENDPOINT: "http://127.0.0.1:9000/chat",
        ORBITRAG_API_KEY: "test-secret",
        ORBITRAG_MODEL: "env-model",
        ORBITRAG_LEVEL: "4",
        ORBITRAG_TIMEOUT_MS: "1000",
      };
      expect(resolveConfig({}, env)).toEqual({
        endpoint: "http://127.0.0.1:9000/chat",
        apiKey: "test-secret",
        model: "env-model",
        level: 4,
        timeoutMs: 1000,
      });
    });

    it("should prefer CLI options over env vars", () => {
      const env = { ORBITRAG_MODEL: "env-model", ORBITRAG_LEVEL: "4" };
      expect(resolveConfig({ model: "cli-model", level: 6, timeout: 2500 }, env)).toMatchObject({
        model: "cli-model",
        level: 6,
        timeoutMs: 2500,
      });
    });

    it("should reject a malformed level in the environment", () => {
      expect(() => resolveConfig({}, { ORBITRAG_LEVEL: "zero" })).toThrow(
        InvalidConfigurationError
      );
    });
  });

  describe("isVerbose", () => {
    it("should read ORBITRAG_CLI_DEBUG", () => {
      expect(isVerbose({ ORBITRAG_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ ORBITRAG_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
