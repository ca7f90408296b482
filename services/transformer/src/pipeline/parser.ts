import {
  LosslessNumber,
  isInteger,
  isSafeNumber,
  parse,
} from "lossless-json";
import { type JsonValue, isJsonValue } from "../types.js";

export type ParseStep =
  | { kind: "value"; value: JsonValue; offset: number }
  | { kind: "error"; offset: number; reason: string };

const WHITESPACE = /\s/;
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const LITERALS = ["true", "false", "null"] as const;

/** Keeps every digit of numbers that a double would round. */
export function parseNumber(value: string): number | bigint | LosslessNumber {
  if (isSafeNumber(value)) return parseFloat(value);
  return isInteger(value) ? BigInt(value) : new LosslessNumber(value);
}

/**
 * Finds where the JSON value starting at `start` ends. Strings, objects
 * and arrays are delimited by scanning; scalars by their grammar. Returns
 * -1 when no complete value starts there. The slice is still handed to
 * the JSON parser, which does the real validation.
 */
export function findValueEnd(text: string, start: number): number {
  const first = text[start];

  if (first === '"') {
    for (let i = start + 1; i < text.length; i++) {
      if (text[i] === "\\") i++;
      else if (text[i] === '"') return i + 1;
    }
    return -1;
  }

  if (first === "{" || first === "[") {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (ch === "\\") i++;
        else if (ch === '"') inString = false;
      } else if (ch === '"') {
        inString = true;
      } else if (ch === "{" || ch === "[") {
        depth++;
      } else if (ch === "}" || ch === "]") {
        depth--;
        if (depth === 0) return i + 1;
      }
    }
    return -1;
  }

  for (const literal of LITERALS) {
    if (text.startsWith(literal, start)) return start + literal.length;
  }

  NUMBER.lastIndex = start;
  return NUMBER.test(text) ? NUMBER.lastIndex : -1;
}

/**
 * Decodes every JSON value in `text`, whether it holds one value, one
 * array (yielded element by element) or several values run together
 * with or without whitespace between them. Scanning stops at the first
 * malformed value; the final step then reports its offset in bytes.
 */
export function* parseValues(text: string): Generator<ParseStep> {
  let idx = 0;
  let scanned = 0;
  let byteOffset = 0;
  const length = text.length;

  while (idx < length) {
    while (idx < length && WHITESPACE.test(text[idx])) idx++;
    if (idx >= length) return;

    byteOffset += Buffer.byteLength(text.slice(scanned, idx), "utf8");
    scanned = idx;
    const offset = byteOffset;
    const end = findValueEnd(text, idx);
    if (end === -1) {
      yield {
        kind: "error",
        offset,
        reason: `no JSON value starts with ${JSON.stringify(text.slice(idx, idx + 16))}`,
      };
      return;
    }

    let value: unknown;
    try {
      value = parse(text.slice(idx, end), null, parseNumber);
    } catch (error) {
      yield {
        kind: "error",
        offset,
        reason: error instanceof Error ? error.message : String(error),
      };
      return;
    }

    if (!isJsonValue(value)) {
      yield { kind: "error", offset, reason: "decoded value is not JSON data" };
      return;
    }

    if (Array.isArray(value)) {
      for (const element of value) yield { kind: "value", value: element, offset };
    } else {
      yield { kind: "value", value, offset };
    }
    idx = end;
  }
}
