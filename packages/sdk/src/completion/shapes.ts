/**
 * Known completion response shapes
 *
 * Shapes are tried in a fixed priority order: an OpenAI-style `choices` array,
 * an Anthropic-style `content` field, an Ollama-style `response` field, and a
 * chat `message` object. Anything else is returned as serialized JSON.
 */

import { ResponseShapeError } from "../errors.js";

export type ShapeKind = "choices" | "content" | "response" | "message" | "raw";

export type CompletionShape =
  | { kind: "choices"; text: string }
  | { kind: "content"; text: string }
  | { kind: "response"; text: string }
  | { kind: "message"; text: string }
  | { kind: "raw"; text: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text form of a value that is not already a string
 */
export function serializeResponse(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? String(value);
}

function fromChoices(choices: unknown): string {
  if (!Array.isArray(choices) || choices.length === 0) {
    throw new ResponseShapeError("choices", "expected a non-empty array");
  }
  const first: unknown = choices[0];
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;
  if (typeof content !== "string") {
    throw new ResponseShapeError("choices", "choices[0].message.content is not a string");
  }
  return content;
}

function fromContent(content: unknown, data: Record<string, unknown>): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) {
    throw new ResponseShapeError("content", "expected a string or an array of parts");
  }
  if (content.length === 0) {
    throw new ResponseShapeError("content", "parts array is empty");
  }
  const part: unknown = content[0];
  if (!isRecord(part)) {
    throw new ResponseShapeError("content", "first part is not an object");
  }
  return typeof part.text === "string" ? part.text : serializeResponse(data);
}

function fromMessage(message: unknown, data: Record<string, unknown>): string {
  if (!isRecord(message)) {
    throw new ResponseShapeError("message", "expected an object");
  }
  if (!Object.hasOwn(message, "content")) {
    return serializeResponse(data);
  }
  return serializeResponse(message.content);
}

/**
 * Classify a parsed response body and extract its answer text
 * @throws {ResponseShapeError} If a recognized key has the wrong structure
 */
export function classifyResponse(data: unknown): CompletionShape {
  if (!isRecord(data)) {
    return { kind: "raw", text: serializeResponse(data) };
  }
  if (Object.hasOwn(data, "choices")) {
    return { kind: "choices", text: fromChoices(data.choices) };
  }
  if (Object.hasOwn(data, "content")) {
    return { kind: "content", text: fromContent(data.content, data) };
  }
  if (Object.hasOwn(data, "response")) {
    return { kind: "response", text: serializeResponse(data.response) };
  }
  if (Object.hasOwn(data, "message")) {
    return { kind: "message", text: fromMessage(data.message, data) };
  }
  return { kind: "raw", text: serializeResponse(data) };
}

/**
 * Answer text of a parsed response body
 * @throws {ResponseShapeError} If a recognized key has the wrong structure
 */
export function extractAnswer(data: unknown): string {
  return classifyResponse(data).text;
}
