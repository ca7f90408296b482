import {
  type CdcMetadata,
  type JsonObject,
  type JsonValue,
  type Outcome,
  type Route,
  type RoutedRow,
  isJsonObject,
  ok,
  skip,
} from "../types.js";

/** DMS writes heartbeat and bookkeeping rows to tables with this prefix. */
export const CONTROL_TABLE_PREFIX = "awsdms_";

export const DATA_RECORD_TYPE = "data";

export const ANY_SCHEMA = "*";

export interface RouteTableEntry {
  schema: string;
  table: string;
  domain: string;
}

export interface RouterOptions {
  legacyRoute: Route;
  includeCdcMetadata?: boolean;
}

/**
 * Allow-list of `(schema, table) → domain`. Entries whose schema is `*`
 * match the table under any schema; an exact schema entry wins.
 */
export class RouteTable {
  private exact = new Map<string, Route>();
  private anySchema = new Map<string, Route>();

  constructor(entries: RouteTableEntry[]) {
    for (const entry of entries) {
      const schema = entry.schema.toLowerCase();
      const table = entry.table.toLowerCase();
      const route = { domain: entry.domain.toLowerCase(), table };
      if (schema === ANY_SCHEMA) this.anySchema.set(table, route);
      else this.exact.set(`${schema}.${table}`, route);
    }
  }

  lookup(schema: string, table: string): Route | undefined {
    return this.exact.get(`${schema}.${table}`) ?? this.anySchema.get(table);
  }

  get size(): number {
    return this.exact.size + this.anySchema.size;
  }
}

const readString = (value: JsonValue | undefined): string | undefined =>
  typeof value === "string" ? value : undefined;

function readMetadata(raw: JsonObject): CdcMetadata {
  const transactionId = raw["transaction-id"];
  return {
    "schema-name": readString(raw["schema-name"]),
    "table-name": readString(raw["table-name"]),
    "record-type": readString(raw["record-type"]),
    operation: readString(raw.operation),
    timestamp: readString(raw.timestamp),
    "transaction-id":
      typeof transactionId === "number" || typeof transactionId === "bigint"
        ? transactionId
        : readString(transactionId),
  };
}

function withLineage(row: JsonObject, metadata: CdcMetadata): JsonObject {
  return {
    ...row,
    op_type: metadata.operation ?? null,
    source_timestamp: metadata.timestamp ?? null,
    schema_name: metadata["schema-name"] ?? null,
    table_name: metadata["table-name"] ?? null,
    transaction_id: metadata["transaction-id"] ?? null,
  };
}

/**
 * Decides where one decoded value goes. Every "drop" is a `skip` whose
 * reason starts with the drop category (`control`, `record-type`,
 * `unrouted`, `shape`).
 */
export function routeValue(
  value: JsonValue,
  table: RouteTable,
  options: RouterOptions
): Outcome<RoutedRow> {
  if (!isJsonObject(value)) {
    const kind = Array.isArray(value)
      ? "array"
      : value === null
      ? "null"
      : typeof value;
    return skip(`shape: expected an object, got ${kind}`);
  }

  if (!("data" in value && "metadata" in value)) {
    // Bare rows bypass the allow-list and land in the legacy route.
    return ok({ route: options.legacyRoute, row: value });
  }

  const rawMetadata = value.metadata;
  if (!isJsonObject(rawMetadata)) {
    return skip("shape: envelope metadata is not an object");
  }
  const metadata = readMetadata(rawMetadata);
  const tableName = (metadata["table-name"] ?? "").toLowerCase();
  const schemaName = (metadata["schema-name"] ?? "").toLowerCase();

  if (tableName.startsWith(CONTROL_TABLE_PREFIX)) {
    return skip(`control: ${tableName}`);
  }

  const recordType = metadata["record-type"];
  if (recordType !== undefined && recordType.toLowerCase() !== DATA_RECORD_TYPE) {
    return skip(`record-type: ${recordType}`);
  }

  const route = table.lookup(schemaName, tableName);
  if (!route) {
    return skip(`unrouted: ${schemaName}.${tableName}`);
  }

  const data = value.data;
  if (!isJsonObject(data)) {
    return skip(`shape: envelope data for ${schemaName}.${tableName} is not an object`);
  }

  return ok({
    route,
    row: options.includeCdcMetadata ? withLineage(data, metadata) : data,
  });
}
