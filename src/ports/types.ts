/**
 * Trace event types emitted while evaluating.
 */
export type TraceEvent =
  | { tag: "E_Define"; name: string }
  | { tag: "E_Set"; name: string }
  | { tag: "E_TailCall"; procedure: string; arity: number }
  | { tag: "E_PrimCall"; id: string; name: string; durationMs: number; ok: boolean };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/** Sink that drops everything. */
export const NULL_TRACE: TraceSink = {
  emit() {},
};
