import { gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createHandler, decodeS3Key } from "../src/handler.js";
import { loadConfig } from "../src/config.js";
import { BatchFailedError, ConfigError } from "../src/errors.js";
import { InMemoryObjectStore, quietConsole, s3Event } from "./helpers.js";

const BUCKET = "data-lake";

const employeeLine =
  '{"data":{"id":1,"name":"Ann"},"metadata":{"table-name":"employees","schema-name":"public","record-type":"data"}}';

const financeLine = (id: number, table = "transactions") =>
  `{"data":{"id":${id},"created_at":1700000000},"metadata":{"schema-name":"finance","table-name":"${table}","record-type":"data"}}`;

describe("decodeS3Key", () => {
  it("decodes URL escapes and plus signs", () => {
    expect(decodeS3Key("raw/year%3D2026/my+file.gz")).toBe("raw/year=2026/my file.gz");
  });
});

describe("handler", () => {
  let store: InMemoryObjectStore;

  beforeEach(() => {
    quietConsole();
    store = new InMemoryObjectStore();
  });

  it("writes a duplicated employees line once", async () => {
    store.seed(BUCKET, "raw/2026/02/07/dms.json", `${employeeLine}\n${employeeLine}`);
    const handler = createHandler({ store, config: loadConfig({}) });

    const response = await handler(s3Event(BUCKET, "raw/2026/02/07/dms.json"));

    expect(store.text(BUCKET, "trusted/hr/employees/2026/02/07/dms.json")).toBe(
      '{"id":1,"name":"Ann"}\n'
    );
    expect(response).toMatchObject({
      statusCode: 200,
      ok: true,
      message: "Transformation completed successfully",
      processed: 1,
      skipped: 0,
      empty: 0,
      written: 1,
      records: 1,
    });
  });

  it("splits a gzipped object across route keys", async () => {
    const body = gzipSync(
      [financeLine(1), financeLine(2, "accounts"), financeLine(1)].join("\n")
    );
    store.seed(BUCKET, "raw/cdc/part-1.gz", new Uint8Array(body));
    const handler = createHandler({ store, config: loadConfig({}) });

    await handler(s3Event(BUCKET, "raw/cdc/part-1.gz"));

    expect(store.puts.map((p) => p.key).sort()).toEqual([
      "trusted/finance/accounts/cdc/part-1.json",
      "trusted/finance/transactions/cdc/part-1.json",
    ]);
    expect(store.text(BUCKET, "trusted/finance/transactions/cdc/part-1.json")).toBe(
      '{"id":1,"created_at":"2023-11-14T22:13:20Z"}\n'
    );
  });

  it("skips keys outside the raw prefix and malformed notifications", async () => {
    const handler = createHandler({ store, config: loadConfig({}) });
    const event = s3Event(BUCKET, "trusted/hr/employees/x.json", "");

    const response = await handler(event);

    expect(response).toMatchObject({ processed: 0, skipped: 2, written: 0 });
    expect(store.puts).toEqual([]);
  });

  it("does not write when nothing survives", async () => {
    store.seed(
      BUCKET,
      "raw/heartbeat.json",
      '{"data":{},"metadata":{"schema-name":"public","table-name":"awsdms_status","record-type":"data"}}'
    );
    const handler = createHandler({ store, config: loadConfig({}) });

    const response = await handler(s3Event(BUCKET, "raw/heartbeat.json"));

    expect(response).toMatchObject({ processed: 1, empty: 1, written: 0 });
    expect(store.puts).toEqual([]);
  });

  it("writes to DATA_LAKE_BUCKET when configured", async () => {
    store.seed("landing", "raw/a.json", employeeLine);
    const handler = createHandler({
      store,
      config: loadConfig({ DATA_LAKE_BUCKET: "lake" }),
    });

    await handler(s3Event("landing", "raw/a.json"));

    expect(store.text("lake", "trusted/hr/employees/a.json")).toBe('{"id":1,"name":"Ann"}\n');
  });

  it("finishes the other objects before failing the batch", async () => {
    store.seed(BUCKET, "raw/good.json", employeeLine);
    const handler = createHandler({
      store,
      config: loadConfig({ CONCURRENCY: "1" }),
    });

    const attempt = handler(s3Event(BUCKET, "raw/missing.json", "raw/good.json"));

    await expect(attempt).rejects.toBeInstanceOf(BatchFailedError);
    await expect(attempt).rejects.toThrow(
      "Transformation failed for 1 object(s): raw/missing.json"
    );
    expect(store.text(BUCKET, "trusted/hr/employees/good.json")).toBe(
      '{"id":1,"name":"Ann"}\n'
    );
  });

  it("fails the batch when a route write fails", async () => {
    store.seed(BUCKET, "raw/mixed.json", `${financeLine(1)}\n${financeLine(2, "accounts")}`);
    store.failPutsFor.add("trusted/finance/transactions/mixed.json");
    const handler = createHandler({ store, config: loadConfig({}) });

    await expect(handler(s3Event(BUCKET, "raw/mixed.json"))).rejects.toThrow(
      BatchFailedError
    );
    expect(store.text(BUCKET, "trusted/finance/accounts/mixed.json")).toBe(
      '{"id":2,"created_at":"2023-11-14T22:13:20Z"}\n'
    );
  });

  describe("setup", () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it("reads configuration when the handler is created", () => {
      vi.stubEnv("CONCURRENCY", "0");
      expect(() => createHandler({ store })).toThrow(ConfigError);
    });

    it("builds the route table once and reuses it across invocations", async () => {
      const config = loadConfig({});
      const handler = createHandler({ store, config });
      config.routes.length = 0;

      store.seed(BUCKET, "raw/first.json", employeeLine);
      store.seed(BUCKET, "raw/second.json", employeeLine);
      await handler(s3Event(BUCKET, "raw/first.json"));
      await handler(s3Event(BUCKET, "raw/second.json"));

      expect(store.puts.map((p) => p.key)).toEqual([
        "trusted/hr/employees/first.json",
        "trusted/hr/employees/second.json",
      ]);
    });
  });
});
