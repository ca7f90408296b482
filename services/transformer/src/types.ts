import { isLosslessNumber, type LosslessNumber } from "lossless-json";

/**
 * Integers beyond 2^53 decode to `bigint`; other numbers that a double
 * cannot hold exactly stay as `LosslessNumber`, so their digits survive.
 */
export type JsonPrimitive =
  | string
  | number
  | bigint
  | LosslessNumber
  | boolean
  | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Recoverable conditions travel as values. Only storage and decode
 * failures use thrown errors.
 */
export type Outcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "skip"; reason: string }
  | { kind: "fatal"; error: Error };

export const ok = <T>(value: T): Outcome<T> => ({ kind: "ok", value });

export const skip = <T = never>(reason: string): Outcome<T> => ({
  kind: "skip",
  reason,
});

export const fatal = <T = never>(error: Error): Outcome<T> => ({
  kind: "fatal",
  error,
});

export interface RawPayload {
  bucket: string;
  key: string;
  body: Uint8Array;
  contentEncoding?: string;
}

export interface CdcMetadata {
  "schema-name"?: string;
  "table-name"?: string;
  "record-type"?: string;
  operation?: string;
  timestamp?: string;
  "transaction-id"?: string | number | bigint;
}

export interface Route {
  domain: string;
  table: string;
}

export type CleanedRecord = JsonObject;

export interface RoutedRow {
  route: Route;
  row: JsonObject;
}

export interface RouteBatch {
  route: Route;
  records: CleanedRecord[];
}

export interface TransformStats {
  values: number;
  routed: number;
  dropped: number;
  emptied: number;
  duplicates: number;
  parseErrorOffset?: number;
}

export interface TransformResult {
  batches: RouteBatch[];
  stats: TransformStats;
}

export interface WrittenObject {
  route: Route;
  key: string;
  records: number;
  bytes: number;
}

export interface ObjectResult {
  bucket: string;
  key: string;
  status: "written" | "empty";
  written: WrittenObject[];
  stats?: TransformStats;
}

export interface StoredObject {
  body: Uint8Array;
  contentEncoding?: string;
}

export interface PutObjectRequest {
  bucket: string;
  key: string;
  body: string;
  contentType: string;
}

/**
 * Storage port. `S3Utils` is the production implementation.
 */
export interface ObjectStore {
  getObject(bucket: string, key: string): Promise<StoredObject>;
  putObject(request: PutObjectRequest): Promise<void>;
}

export interface HandlerResponse {
  statusCode: number;
  ok: boolean;
  message: string;
  processed: number;
  skipped: number;
  empty: number;
  written: number;
  records: number;
  processingTimeMs: number;
  logs: { total: number; byLevel: Record<string, number> };
  timestamp: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return true;
    case "object":
      if (value === null || isLosslessNumber(value)) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function routeId(route: Route): string {
  return `${route.domain}/${route.table}`;
}
