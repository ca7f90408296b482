import { ConfigError } from "./errors.js";
import { LogLevel, parseLogLevel } from "./utils/logger.js";
import type { Route } from "./types.js";
import { ANY_SCHEMA, type RouteTableEntry } from "./pipeline/router.js";

export interface TransformerConfig {
  /** Falls back to the bucket named by each notification. */
  bucket?: string;
  region?: string;
  rawPrefix: string;
  trustedPrefix: string;
  routes: RouteTableEntry[];
  legacyRoute: Route;
  includeCdcMetadata: boolean;
  concurrency: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const normalizePrefix = (value: string) =>
  value.replace(/^\/+|\/+$/g, "") + "/";

const splitList = (value: string) =>
  value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);

function parseRouteTable(value: string): RouteTableEntry[] {
  return splitList(value).map((entry) => {
    const match = entry.match(/^([^.=\s]+)\.([^.=\s]+)=([^=\s/]+)$/);
    if (!match) {
      throw new ConfigError(
        `Invalid ROUTE_TABLE entry "${entry}" (expected schema.table=domain)`
      );
    }
    return { schema: match[1], table: match[2], domain: match[3] };
  });
}

function parseRoute(name: string, value: string): Route {
  const [domain, table, ...rest] = value.trim().toLowerCase().split("/");
  if (!domain || !table || rest.length) {
    throw new ConfigError(`Invalid ${name} "${value}" (expected domain/table)`);
  }
  return { domain, table };
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): TransformerConfig {
  const financeSchema = (env.FINANCE_SCHEMA_NAME || "finance")
    .trim()
    .toLowerCase();
  const financeTables = splitList(
    env.FINANCE_TABLE_LIST || "transactions,accounts"
  );
  const hrTables = splitList(env.HR_TABLE_LIST || "employees");

  const routes: RouteTableEntry[] = [
    ...financeTables.map((table) => ({
      schema: financeSchema,
      table,
      domain: "finance",
    })),
    ...hrTables.map((table) => ({ schema: ANY_SCHEMA, table, domain: "hr" })),
    ...parseRouteTable(env.ROUTE_TABLE || ""),
  ];

  return {
    bucket: env.DATA_LAKE_BUCKET || undefined,
    region: env.AWS_REGION || undefined,
    rawPrefix: normalizePrefix(env.RAW_PREFIX || "raw/"),
    trustedPrefix: normalizePrefix(env.TRUSTED_PREFIX || "trusted/"),
    routes,
    legacyRoute: parseRoute("LEGACY_ROUTE", env.LEGACY_ROUTE || "hr/employees"),
    includeCdcMetadata:
      (env.INCLUDE_CDC_METADATA || "false").toLowerCase() === "true",
    concurrency: parsePositiveInt("CONCURRENCY", env.CONCURRENCY || "10"),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
