import { type TransformStats, type WrittenObject, routeId } from "../types.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
  SUCCESS = "SUCCESS",
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface ProcessingLog {
  timestamp: string;
  level: LogLevel;
  message: string;
  objectKey?: string;
  details?: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || "info").toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private logs: ProcessingLog[] = [];
  private threshold: LogLevel;

  constructor(threshold: LogLevel = LogLevel.INFO) {
    this.threshold = threshold;
  }

  log(
    level: LogLevel,
    message: string,
    objectKey?: string,
    details?: unknown
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

    const logEntry: ProcessingLog = {
      timestamp: new Date().toISOString(),
      level,
      message,
      objectKey,
      details,
    };

    this.logs.push(logEntry);

    const logMessage = `[${logEntry.timestamp}] ${level} ${
      objectKey ? `[${objectKey}] ` : ""
    }${message}`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(logMessage, details ?? "");
        break;
      case LogLevel.WARN:
        console.warn(logMessage, details ?? "");
        break;
      case LogLevel.DEBUG:
        console.debug(logMessage, details ?? "");
        break;
      default:
        console.log(logMessage, details ?? "");
    }
  }

  debug(message: string, objectKey?: string, details?: unknown): void {
    this.log(LogLevel.DEBUG, message, objectKey, details);
  }

  info(message: string, objectKey?: string, details?: unknown): void {
    this.log(LogLevel.INFO, message, objectKey, details);
  }

  warn(message: string, objectKey?: string, details?: unknown): void {
    this.log(LogLevel.WARN, message, objectKey, details);
  }

  error(message: string, objectKey?: string, details?: unknown): void {
    this.log(LogLevel.ERROR, message, objectKey, details);
  }

  success(message: string, objectKey?: string, details?: unknown): void {
    this.log(LogLevel.SUCCESS, message, objectKey, details);
  }

  logTransformStats(objectKey: string, stats: TransformStats): void {
    this.info(`Transformed ${stats.routed} records`, objectKey, {
      values: stats.values,
      dropped: stats.dropped,
      emptied: stats.emptied,
      duplicates: stats.duplicates,
      truncatedAt: stats.parseErrorOffset,
    });
  }

  logWrite(objectKey: string, written: WrittenObject): void {
    this.success(`Wrote ${routeId(written.route)}`, objectKey, {
      key: written.key,
      records: written.records,
      bytes: written.bytes,
    });
  }

  logBatchSummary(
    total: number,
    written: number,
    failed: number,
    processingTimeMs: number
  ): void {
    this.info(`Batch processing completed`, undefined, {
      total,
      written,
      failed,
      processingTimeMs,
      avgTimePerObject:
        total > 0 ? (processingTimeMs / total).toFixed(2) + "ms" : "0ms",
    });
  }

  getLogs(): ProcessingLog[] {
    return [...this.logs];
  }

  getLogsSummary(): { total: number; byLevel: Record<LogLevel, number> } {
    const byLevel = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 0,
      [LogLevel.WARN]: 0,
      [LogLevel.ERROR]: 0,
      [LogLevel.SUCCESS]: 0,
    };

    this.logs.forEach((log) => {
      byLevel[log.level]++;
    });

    return {
      total: this.logs.length,
      byLevel,
    };
  }
}
