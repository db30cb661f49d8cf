import { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";
import { TraceStore, type TraceQueryOptions } from "./trace-store.js";

export interface TracerOptions {
  debugMode?: boolean;
  maxRows?: number;
  /** Mirror every stored entry, e.g. to the browser console */
  sink?: (entry: LogEntry) => void;
}

type TraceFields = Omit<LogEntryInput, "traceId" | "level" | "cmd">;

export interface TraceLogger {
  debug: (fields: TraceFields) => void;
  info: (fields: TraceFields) => void;
  warn: (fields: TraceFields) => void;
  error: (fields: TraceFields) => void;
  traceId: string;
}

function randomHex(bytes: number): string {
  const buf = new Uint8Array(bytes);
  globalThis.crypto.getRandomValues(buf);
  return Array.from(buf, (b) => b.toString(16).padStart(2, "0")).join("");
}

export class Tracer {
  private store: TraceStore;
  private debugMode: boolean;
  private sink?: (entry: LogEntry) => void;

  constructor(opts?: TracerOptions) {
    this.store = new TraceStore({ maxRows: opts?.maxRows });
    this.debugMode = opts?.debugMode ?? false;
    this.sink = opts?.sink;
  }

  createTrace(cmd: string): TraceLogger {
    const traceId = `${cmd}-${randomHex(4)}`;

    const log = (level: LogLevel, fields: TraceFields) => {
      if (level === "debug" && !this.debugMode) return;
      const entry = createLogEntry({ ...fields, traceId, level, cmd });
      this.store.insert(entry);
      this.sink?.(entry);
    };

    return {
      debug: (f) => log("debug", f),
      info: (f) => log("info", f),
      warn: (f) => log("warn", f),
      error: (f) => log("error", f),
      traceId,
    };
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  query(opts: TraceQueryOptions = {}): LogEntry[] {
    return this.store.query(opts);
  }

  exportJsonl(opts: TraceQueryOptions = {}): string {
    return this.store.exportJsonl(opts);
  }

  clear(): void {
    this.store.clear();
  }
}
