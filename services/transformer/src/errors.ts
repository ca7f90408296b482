export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StorageError extends Error {
  readonly operation: "get" | "put";
  readonly bucket: string;
  readonly key: string;

  constructor(
    operation: "get" | "put",
    bucket: string,
    key: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`S3 ${operation} failed for s3://${bucket}/${key}: ${reason}`, {
      cause,
    });
    this.name = "StorageError";
    this.operation = operation;
    this.bucket = bucket;
    this.key = key;
  }
}

export class DecodeError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not decode ${key}: ${reason}`, { cause });
    this.name = "DecodeError";
    this.key = key;
  }
}

export class WriteBatchError extends Error {
  readonly failures: Error[];

  constructor(sourceKey: string, failures: Error[]) {
    super(
      `${failures.length} route write(s) failed for ${sourceKey}: ${failures
        .map((f) => f.message)
        .join("; ")}`
    );
    this.name = "WriteBatchError";
    this.failures = failures;
  }
}

export class BatchFailedError extends Error {
  readonly failures: Array<{ key: string; error: Error }>;

  constructor(failures: Array<{ key: string; error: Error }>) {
    super(
      `Transformation failed for ${failures.length} object(s): ${failures
        .map((f) => f.key)
        .join(", ")}`
    );
    this.name = "BatchFailedError";
    this.failures = failures;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
