import { gunzipSync } from "node:zlib";
import { DecodeError } from "../errors.js";
import type { RawPayload } from "../types.js";

const GZIP_MAGIC = [0x1f, 0x8b];

export function isGzipped(payload: RawPayload): boolean {
  if (payload.key.toLowerCase().endsWith(".gz")) return true;
  if (payload.contentEncoding?.toLowerCase() === "gzip") return true;
  return (
    payload.body.length >= 2 &&
    payload.body[0] === GZIP_MAGIC[0] &&
    payload.body[1] === GZIP_MAGIC[1]
  );
}

export function decodeBlob(payload: RawPayload): string {
  try {
    const bytes = isGzipped(payload)
      ? gunzipSync(payload.body)
      : payload.body;
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(
      bytes
    );
  } catch (error) {
    throw new DecodeError(payload.key, error);
  }
}
