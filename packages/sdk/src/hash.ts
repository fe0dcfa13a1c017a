/**
 * Content digests for fragments
 */

import { createHash } from "node:crypto";
import { FRAGMENT_ID_LENGTH } from "./config.js";

function md5Hex(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex");
}

/**
 * MD5 digest of text as a non-negative integer
 */
export function contentHash(text: string): bigint {
  return BigInt(`0x${md5Hex(text)}`);
}

/**
 * Short content-derived identifier for a chunk
 */
export function fragmentId(text: string): string {
  return md5Hex(text).slice(0, FRAGMENT_ID_LENGTH);
}
