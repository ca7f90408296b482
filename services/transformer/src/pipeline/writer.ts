import { stringify } from "lossless-json";
import { WriteBatchError, toError } from "../errors.js";
import type {
  CleanedRecord,
  ObjectStore,
  RouteBatch,
  WrittenObject,
} from "../types.js";
import { generateTrustedKey, type KeyPrefixes } from "./keys.js";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export function toNdjson(records: CleanedRecord[]): string {
  return records.map((record) => `${stringify(record)}\n`).join("");
}

export class TrustedWriter {
  private store: ObjectStore;
  private prefixes: KeyPrefixes;

  constructor(store: ObjectStore, prefixes: KeyPrefixes) {
    this.store = store;
    this.prefixes = prefixes;
  }

  /**
   * Puts every non-empty batch. All routes are attempted; failures are
   * thrown together afterwards.
   */
  async writeBatches(
    bucket: string,
    sourceKey: string,
    batches: RouteBatch[]
  ): Promise<WrittenObject[]> {
    const pending = batches
      .filter((batch) => batch.records.length > 0)
      .map(async ({ route, records }): Promise<WrittenObject> => {
        const key = generateTrustedKey(sourceKey, route, this.prefixes);
        const body = toNdjson(records);
        await this.store.putObject({
          bucket,
          key,
          body,
          contentType: NDJSON_CONTENT_TYPE,
        });
        return {
          route,
          key,
          records: records.length,
          bytes: Buffer.byteLength(body, "utf8"),
        };
      });

    const settled = await Promise.allSettled(pending);
    const written: WrittenObject[] = [];
    const failures: Error[] = [];
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") written.push(outcome.value);
      else failures.push(toError(outcome.reason));
    }

    if (failures.length) throw new WriteBatchError(sourceKey, failures);
    return written;
  }
}
