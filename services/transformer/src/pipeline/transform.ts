import type { TransformResult, TransformStats } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { BatchDeduplicator } from "./dedup.js";
import { normalizeRecord } from "./normalizer.js";
import { parseValues } from "./parser.js";
import { routeValue, type RouteTable, type RouterOptions } from "./router.js";

export interface TransformOptions extends RouterOptions {
  routeTable: RouteTable;
  logger: Logger;
  sourceKey: string;
}

/**
 * Parses, routes, cleans and deduplicates one decoded payload. Nothing
 * is written here; the caller gets the complete route batches.
 */
export function transformPayload(
  text: string,
  options: TransformOptions
): TransformResult {
  const { routeTable, logger, sourceKey } = options;
  const dedup = new BatchDeduplicator();
  const stats: TransformStats = {
    values: 0,
    routed: 0,
    dropped: 0,
    emptied: 0,
    duplicates: 0,
  };

  for (const step of parseValues(text)) {
    if (step.kind === "error") {
      stats.parseErrorOffset = step.offset;
      logger.warn(
        `Invalid JSON at byte ${step.offset}; keeping ${stats.values} decoded values`,
        sourceKey,
        { reason: step.reason }
      );
      break;
    }
    stats.values++;

    const routed = routeValue(step.value, routeTable, options);
    if (routed.kind !== "ok") {
      stats.dropped++;
      if (routed.kind === "skip" && routed.reason.startsWith("shape:")) {
        logger.warn(`Dropped value at byte ${step.offset}`, sourceKey, {
          reason: routed.reason,
        });
      } else {
        logger.debug(`Dropped value at byte ${step.offset}`, sourceKey, {
          reason: routed.kind === "skip" ? routed.reason : routed.error.message,
        });
      }
      continue;
    }

    const normalized = normalizeRecord(routed.value.row);
    if (normalized.kind !== "ok") {
      stats.emptied++;
      continue;
    }
    for (const warning of normalized.value.warnings) {
      logger.warn(warning, sourceKey);
    }

    if (dedup.add(routed.value.route, normalized.value.record)) {
      stats.routed++;
    }
  }

  stats.duplicates = dedup.duplicates;
  return { batches: dedup.batches(), stats };
}
