// Wire codec for NPC messages.
//
// Messages travel as JSON text. Byte-oriented transports use the UTF-8
// frame variants. Decoding validates the presence rules with zod so the
// engine only ever sees well-formed messages.

import type { ZodIssue } from "zod";

import { WireError } from "./errors.ts";
import { MessageSchema } from "./schemas.ts";
import type { Message } from "./types.ts";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

// ============================================================================
// Structured Values
// ============================================================================

/**
 * Validate an already-structured value (e.g. from a MessagePort).
 *
 * @throws WireError if the value is not a protocol message
 */
export function parseMessage(value: unknown): Message {
  const result = MessageSchema.safeParse(value);
  if (!result.success) {
    throw WireError.schema(result.error.issues.map(formatIssue));
  }
  return result.data;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

// ============================================================================
// Text Encoding/Decoding
// ============================================================================

/**
 * Encode a Message to JSON text.
 *
 * Fields holding `undefined` are left out.
 */
export function encodeMessage(message: Message): string {
  return JSON.stringify(message);
}

/**
 * Decode a Message from JSON text.
 *
 * @throws WireError on malformed JSON or a message violating the schema
 */
export function decodeMessage(text: string): Message {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw WireError.syntax(e instanceof Error ? e.message : String(e));
  }
  return parseMessage(value);
}

// ============================================================================
// Frame Encoding/Decoding
// ============================================================================

/**
 * Encode a Message to UTF-8 bytes.
 */
export function encodeFrame(message: Message): Uint8Array {
  return textEncoder.encode(encodeMessage(message));
}

/**
 * Decode a Message from UTF-8 bytes.
 *
 * @throws WireError on invalid UTF-8, malformed JSON or schema violations
 */
export function decodeFrame(bytes: Uint8Array): Message {
  let text: string;
  try {
    text = textDecoder.decode(bytes);
  } catch (e) {
    throw WireError.syntax(e instanceof Error ? e.message : String(e));
  }
  return decodeMessage(text);
}
