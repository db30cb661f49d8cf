import { Tracer } from "./tracer.js";

let _tracer: Tracer | null = null;

export function getTracer(): Tracer {
  if (!_tracer) {
    _tracer = new Tracer({ debugMode: false });
  }
  return _tracer;
}

/** Drop the shared tracer; the next getTracer() starts empty */
export function resetTracer(): void {
  _tracer = null;
}
