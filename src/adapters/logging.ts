import type { Environment } from "../core/eval/env";
import type { NativeVal } from "../core/eval/values";
import { native } from "../core/eval/values";
import type { TraceEvent, TraceSink } from "../ports/types";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Wrap a primitive with logging.
 */
export function loggingPrimitive(inner: NativeVal, trace: TraceSink): NativeVal {
  return native(inner.name, (args, host) => {
    const id = makeId("prim");
    const start = Date.now();
    try {
      const res = inner.fn(args, host);
      trace.emit({ tag: "E_PrimCall", id, name: inner.name, durationMs: Date.now() - start, ok: true });
      return res;
    } catch (error) {
      trace.emit({ tag: "E_PrimCall", id, name: inner.name, durationMs: Date.now() - start, ok: false });
      throw error;
    }
  });
}

/**
 * Wrap every primitive bound in `env`'s own frame. Returns the number wrapped.
 */
export function withPrimitiveLogging(env: Environment, trace: TraceSink): number {
  let wrapped = 0;
  for (const [name, value] of env.ownEntries()) {
    if (value.tag !== "Native") continue;
    env.define(name, loggingPrimitive(value, trace));
    wrapped++;
  }
  return wrapped;
}

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Define": return `define ${event.name}`;
    case "E_Set": return `set! ${event.name}`;
    case "E_TailCall": return `tail-call ${event.procedure}/${event.arity}`;
    case "E_PrimCall":
      return `prim ${event.name} ${event.ok ? "ok" : "failed"} (${event.durationMs}ms)`;
  }
}

/**
 * Trace sink writing one line per event (stderr by default).
 */
export function consoleTrace(write: (line: string) => void = (line) => console.error(line)): TraceSink {
  return {
    emit(event: TraceEvent): void {
      write(`[trace] ${formatTraceEvent(event)}`);
    },
  };
}

/**
 * Trace sink that keeps every event, for inspection in tests.
 */
export function collectingTrace(): TraceSink & { events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
    },
  };
}
