/**
 * Unit tests for content digests
 */

import { describe, it, expect } from "vitest";
import { contentHash, fragmentId } from "./hash.js";

describe("contentHash", () => {
  it("should return the MD5 digest as an integer", () => {
    expect(contentHash("")).toBe(0xd41d8cd98f00b204e9800998ecf8427en);
    expect(contentHash("hello")).toBe(0x5d41402abc4b2a76b9719d911017c592n);
  });
});

describe("fragmentId", () => {
  it("should use the first eight hex digits of the digest", () => {
    expect(fragmentId("hello")).toBe("5d41402a");
    expect(fragmentId("")).toBe("d41d8cd9");
  });
});
