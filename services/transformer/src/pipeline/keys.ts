import type { Route } from "../types.js";

export interface KeyPrefixes {
  rawPrefix: string;
  trustedPrefix: string;
}

const COMPRESSION_SUFFIX = /\.gz$/i;

/**
 * raw/year=2026/month=02/file.gz + finance/transactions
 *   -> trusted/finance/transactions/year=2026/month=02/file.json
 *
 * Same inputs always give the same key, so a retried object overwrites
 * its earlier output.
 */
export function generateTrustedKey(
  sourceKey: string,
  route: Route,
  { rawPrefix, trustedPrefix }: KeyPrefixes
): string {
  let relative = sourceKey.startsWith(rawPrefix)
    ? sourceKey.slice(rawPrefix.length)
    : sourceKey;
  relative = relative.replace(/^\/+/, "").replace(COMPRESSION_SUFFIX, "");
  if (!relative.toLowerCase().endsWith(".json")) relative += ".json";

  return `${trustedPrefix}${route.domain}/${route.table}/${relative}`;
}
