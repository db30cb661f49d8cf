import { create } from "zustand";
import {
  DEFAULT_SIDEBAR_STATE,
  MemoryParams,
  PRIME_REDIRECTED,
  diffSidebarState,
  getTracer,
  monotonicNanos,
  telemetrySnapshotSchema,
  updateSidebarState,
  type ParamsReader,
  type SidebarState,
  type TelemetrySnapshot,
} from "@telltale/core";

interface SidebarDeps {
  params?: ParamsReader;
  /**
   * Monotonic clock in nanoseconds. Must read the same since-boot clock the
   * device stamps `lastAthenaPingTime` with; the default only counts from
   * process or page start, so hosts are expected to inject the device clock.
   */
  clock?: () => number;
}

interface SidebarStore {
  sidebar: SidebarState;
  params: ParamsReader;
  clock: () => number;
  lastRejection: string | null;

  applyTelemetry: (snapshot: TelemetrySnapshot) => SidebarState;
  ingestTelemetry: (raw: unknown) => boolean;
  configure: (deps: SidebarDeps) => void;
  reset: () => void;
}

function initialState() {
  return {
    sidebar: DEFAULT_SIDEBAR_STATE,
    params: new MemoryParams(),
    clock: monotonicNanos,
    lastRejection: null,
  };
}

export const useSidebarStore = create<SidebarStore>((set, get) => ({
  ...initialState(),

  applyTelemetry: (snapshot) => {
    const { sidebar: prev, params, clock } = get();
    const log = getTracer().createTrace("sidebar");
    const started = Date.now();

    const now = clock();
    const lastPing = snapshot.device.lastAthenaPingTime;
    if (lastPing > 0 && now < lastPing) {
      log.warn({
        scope: "telemetry",
        op: "apply",
        msg: "ping timestamp is ahead of the clock; is the device clock injected?",
        data: { now, lastPing },
      });
    }

    const next = updateSidebarState({
      ...snapshot,
      primeRedirected: params.getBool(PRIME_REDIRECTED),
      now,
    });
    // Whole-state swap in a single set; subscribers repaint from the committed value
    set({ sidebar: next, lastRejection: null });

    for (const change of diffSidebarState(prev, next)) {
      const fields = {
        scope: "status",
        op: "classify",
        item: change.category,
        severity: change.to.severity,
        previous: change.from.severity,
        msg: `${change.category} changed`,
        data: { label: change.to.label },
      };
      if (change.to.severity === "danger") log.warn(fields);
      else log.info(fields);
    }
    log.debug({ scope: "telemetry", op: "apply", msg: "telemetry applied", dur: Date.now() - started });
    return next;
  },

  ingestTelemetry: (raw) => {
    const result = telemetrySnapshotSchema.safeParse(raw);
    if (!result.success) {
      const error = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      getTracer()
        .createTrace("sidebar")
        .warn({ scope: "telemetry", op: "ingest", msg: "rejected telemetry snapshot", error });
      set({ lastRejection: error });
      return false;
    }
    get().applyTelemetry(result.data);
    return true;
  },

  configure: (deps) => {
    set((s) => ({
      params: deps.params ?? s.params,
      clock: deps.clock ?? s.clock,
    }));
  },

  reset: () => set(initialState()),
}));
