import type { LogEntry } from "./logger.js";

export interface TraceQueryOptions {
  traceId?: string;
  level?: string;
  cmd?: string;
  scope?: string;
  op?: string;
  item?: string;
  severity?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

const FILTER_KEYS = ["traceId", "level", "cmd", "scope", "op", "item", "severity"] as const;

/**
 * In-memory ring buffer of log entries. Oldest entries are dropped once
 * maxRows is reached; nothing is written to disk.
 */
export class TraceStore {
  private rows: LogEntry[] = [];
  private maxRows: number;

  constructor(opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 5_000;
  }

  insert(entry: LogEntry): void {
    this.rows.push(entry);
    if (this.rows.length > this.maxRows) {
      this.rows.splice(0, this.rows.length - this.maxRows);
    }
  }

  /** Matching entries, oldest first; `limit` keeps the most recent ones */
  query(opts: TraceQueryOptions = {}): LogEntry[] {
    const matched = this.rows.filter((row) => {
      if (opts.since !== undefined && row.ts < opts.since) return false;
      return FILTER_KEYS.every((key) => opts[key] === undefined || row[key] === opts[key]);
    });
    if (opts.limit !== undefined && matched.length > opts.limit) {
      return matched.slice(matched.length - opts.limit);
    }
    return matched;
  }

  exportJsonl(opts: TraceQueryOptions = {}): string {
    const entries = this.query(opts);
    if (entries.length === 0) return "";
    return entries.map((e) => JSON.stringify(e)).join("\n") + "\n";
  }

  count(): number {
    return this.rows.length;
  }

  clear(): void {
    this.rows = [];
  }
}
