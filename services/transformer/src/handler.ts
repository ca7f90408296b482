import type { S3Event } from "aws-lambda";
import { loadConfig, type TransformerConfig } from "./config.js";
import { BatchFailedError, toError } from "./errors.js";
import { decodeBlob } from "./pipeline/decoder.js";
import { RouteTable } from "./pipeline/router.js";
import { transformPayload } from "./pipeline/transform.js";
import { TrustedWriter } from "./pipeline/writer.js";
import {
  type HandlerResponse,
  type ObjectResult,
  type ObjectStore,
  type Outcome,
  fatal,
  ok,
} from "./types.js";
import { Logger } from "./utils/logger.js";
import { S3Utils } from "./utils/s3.js";

export interface HandlerDeps {
  config?: TransformerConfig;
  store?: ObjectStore;
  logger?: Logger;
}

interface ObjectTarget {
  sourceBucket: string;
  targetBucket: string;
  key: string;
}

interface InvocationContext {
  config: TransformerConfig;
  store: ObjectStore;
  logger: Logger;
  routeTable: RouteTable;
  writer: TrustedWriter;
}

/** S3 notifications URL-encode keys and turn spaces into "+". */
export function decodeS3Key(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, " "));
}

export async function processObject(
  target: ObjectTarget,
  ctx: InvocationContext
): Promise<Outcome<ObjectResult>> {
  const { key, sourceBucket, targetBucket } = target;
  const { config, store, logger, routeTable, writer } = ctx;

  try {
    logger.info(`Processing s3://${sourceBucket}/${key}`, key);

    const stored = await store.getObject(sourceBucket, key);
    logger.debug("Raw object read", key, { bytes: stored.body.length });

    const text = decodeBlob({ bucket: sourceBucket, key, ...stored });
    const { batches, stats } = transformPayload(text, {
      routeTable,
      logger,
      sourceKey: key,
      legacyRoute: config.legacyRoute,
      includeCdcMetadata: config.includeCdcMetadata,
    });
    logger.logTransformStats(key, stats);

    if (!batches.length) {
      logger.info("No valid records after transform; skipping write", key);
      return ok({ bucket: sourceBucket, key, status: "empty", written: [], stats });
    }

    const written = await writer.writeBatches(targetBucket, key, batches);
    written.forEach((object) => logger.logWrite(key, object));

    return ok({ bucket: sourceBucket, key, status: "written", written, stats });
  } catch (error) {
    logger.error("Object transformation failed", key, error);
    return fatal(toError(error));
  }
}

function collectTargets(
  event: S3Event,
  config: TransformerConfig,
  logger: Logger
): { targets: ObjectTarget[]; skipped: number } {
  const targets: ObjectTarget[] = [];
  let skipped = 0;

  for (const rec of event?.Records ?? []) {
    const bucket = rec?.s3?.bucket?.name;
    const keyEsc = rec?.s3?.object?.key;
    if (!bucket || !keyEsc) {
      logger.warn("Skipping notification without bucket or key", undefined, {
        eventName: rec?.eventName,
      });
      skipped++;
      continue;
    }

    let key: string;
    try {
      key = decodeS3Key(keyEsc);
    } catch (error) {
      logger.warn("Skipping notification with malformed key", keyEsc, error);
      skipped++;
      continue;
    }

    if (!key.startsWith(config.rawPrefix)) {
      logger.info(`Skipping non-raw object`, key);
      skipped++;
      continue;
    }

    targets.push({
      sourceBucket: bucket,
      targetBucket: config.bucket ?? bucket,
      key,
    });
  }

  return { targets, skipped };
}

/**
 * Config, route table and S3 client are resolved once, when the handler
 * is created; only the logger is per invocation.
 */
export function createHandler(deps: HandlerDeps = {}) {
  const config = deps.config ?? loadConfig();
  const store = deps.store ?? new S3Utils(undefined, config.region);
  const routeTable = new RouteTable(config.routes);
  const writer = new TrustedWriter(store, config);

  return async (event: S3Event): Promise<HandlerResponse> => {
    const startTime = Date.now();
    const logger = deps.logger ?? new Logger(config.logLevel);
    const ctx: InvocationContext = { config, store, logger, routeTable, writer };

    logger.info("Handler started", undefined, {
      records: event?.Records?.length ?? 0,
      routes: routeTable.size,
    });

    const { targets, skipped } = collectTargets(event, config, logger);

    const results: ObjectResult[] = [];
    const failures: Array<{ key: string; error: Error }> = [];

    for (let i = 0; i < targets.length; i += config.concurrency) {
      const slice = targets.slice(i, i + config.concurrency);
      const outcomes = await Promise.all(
        slice.map((target) => processObject(target, ctx))
      );
      outcomes.forEach((outcome, idx) => {
        if (outcome.kind === "ok") results.push(outcome.value);
        else if (outcome.kind === "fatal") {
          failures.push({ key: slice[idx].key, error: outcome.error });
        }
      });
    }

    const processingTimeMs = Date.now() - startTime;
    const writtenObjects = results.flatMap((r) => r.written);
    logger.logBatchSummary(
      targets.length,
      writtenObjects.length,
      failures.length,
      processingTimeMs
    );

    if (failures.length) {
      // Outputs are overwritten by key, so redelivering the whole batch is safe.
      throw new BatchFailedError(failures);
    }

    const response: HandlerResponse = {
      statusCode: 200,
      ok: true,
      message: "Transformation completed successfully",
      processed: results.length,
      skipped,
      empty: results.filter((r) => r.status === "empty").length,
      written: writtenObjects.length,
      records: writtenObjects.reduce((sum, w) => sum + w.records, 0),
      processingTimeMs,
      logs: logger.getLogsSummary(),
      timestamp: new Date().toISOString(),
    };

    logger.info("Handler completed", undefined, response);
    return response;
  };
}

export const handler = createHandler();
