import crypto from "node:crypto";
import { stringify } from "lossless-json";
import {
  type CleanedRecord,
  type JsonValue,
  type Route,
  type RouteBatch,
  isJsonObject,
  routeId,
} from "../types.js";

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (isJsonObject(value)) {
    const body = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`)
      .join(",");
    return `{${body}}`;
  }
  return stringify(value) ?? "null";
}

export function contentHash(record: CleanedRecord): string {
  return crypto
    .createHash("sha256")
    .update(stableStringify(record))
    .digest("hex");
}

interface RouteGroup {
  route: Route;
  records: CleanedRecord[];
  seen: Set<string>;
}

/**
 * Groups records by route and keeps the first of each content hash.
 * Lives for one source object only; nothing is remembered across objects.
 */
export class BatchDeduplicator {
  private groups = new Map<string, RouteGroup>();
  private duplicateCount = 0;

  /** Returns false when an identical record was already kept for the route. */
  add(route: Route, record: CleanedRecord): boolean {
    const id = routeId(route);
    let group = this.groups.get(id);
    if (!group) {
      group = { route, records: [], seen: new Set() };
      this.groups.set(id, group);
    }

    const hash = contentHash(record);
    if (group.seen.has(hash)) {
      this.duplicateCount++;
      return false;
    }

    group.seen.add(hash);
    group.records.push(record);
    return true;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }

  batches(): RouteBatch[] {
    return [...this.groups.values()]
      .filter((group) => group.records.length > 0)
      .map(({ route, records }) => ({ route, records }));
  }
}
