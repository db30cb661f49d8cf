/**
 * @telltale/core
 * Telemetry types, status classification and logging for the Telltale sidebar
 */

// Types
export * from "./types.js";

// Schemas
export * from "./schema.js";

// Utilities
export * from "./utils.js";

// Classification
export * from "./classifier.js";
export * from "./sidebar-state.js";

// Params
export * from "./params.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";
export { TraceStore, type TraceQueryOptions, type TraceStoreOptions } from "./trace-store.js";
export { Tracer, type TraceLogger, type TracerOptions } from "./tracer.js";
export { getTracer, resetTracer } from "./global-tracer.js";
