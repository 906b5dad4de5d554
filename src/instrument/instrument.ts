import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import type { EventBuffer } from "./buffer.js";
import type { EventRecord, Instrumenter, Span } from "./types.js";

export interface TraceContext {
  traceId: string;
  parentSpanId: string | null;
  instrumenter: Instrumenter;
}

const traceStore = new AsyncLocalStorage<TraceContext>();

export function getTraceContext(): TraceContext | null {
  return traceStore.getStore() ?? null;
}

export function runWithTraceContext<T>(ctx: TraceContext, fn: () => T): T {
  return traceStore.run(ctx, fn);
}

/** Runs `fn` inside a fresh trace that records spans into `buffer`. */
export function runTraced<T>(buffer: EventBuffer, fn: () => T): T {
  return runWithTraceContext(
    {
      traceId: randomUUID(),
      parentSpanId: null,
      instrumenter: new InstrumenterImpl(buffer),
    },
    fn,
  );
}

class SpanImpl implements Span {
  private startTime: number;
  private status_: string | null = null;
  private metadata_: Record<string, unknown> = {};
  private ended = false;

  constructor(
    public readonly traceId: string,
    public readonly spanId: string,
    private readonly parentSpanId: string | null,
    private readonly source: string,
    private readonly component: string,
    private readonly action: string,
    private readonly buffer: EventBuffer,
  ) {
    this.startTime = performance.now();
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    const durationMs = performance.now() - this.startTime;
    const event: EventRecord = {
      trace_id: this.traceId,
      span_id: this.spanId,
      parent_span_id: this.parentSpanId,
      source: this.source,
      component: this.component,
      action: this.action,
      duration_ms: Math.round(durationMs * 100) / 100,
      status: this.status_,
      metadata: Object.keys(this.metadata_).length > 0 ? this.metadata_ : null,
    };
    this.buffer.enqueue(event);
  }

  setStatus(status: string): void {
    this.status_ = status;
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata_[key] = value;
  }
}

export class InstrumenterImpl implements Instrumenter {
  constructor(private readonly buffer: EventBuffer) {}

  startSpan(source: string, component: string, action: string): Span {
    const ctx = getTraceContext();
    const traceId = ctx?.traceId ?? randomUUID();
    const spanId = randomUUID();
    const parentSpanId = ctx?.parentSpanId ?? null;

    const span = new SpanImpl(
      traceId,
      spanId,
      parentSpanId,
      source,
      component,
      action,
      this.buffer,
    );

    // Spans started later in this context become children of this one.
    if (ctx) {
      ctx.parentSpanId = spanId;
    }

    return span;
  }
}

class NoopSpan implements Span {
  get traceId(): string {
    return "";
  }
  get spanId(): string {
    return "";
  }
  end(): void {}
  setStatus(_status: string): void {}
  setMetadata(_key: string, _value: unknown): void {}
}

class NoopInstrumenter implements Instrumenter {
  startSpan(_source: string, _component: string, _action: string): Span {
    return new NoopSpan();
  }
}

const noopInstrumenter = new NoopInstrumenter();

/**
 * Returns the Instrumenter from the current trace context, or a NoopInstrumenter
 * outside of a trace.
 */
export function getInstrumenter(): Instrumenter {
  const ctx = getTraceContext();
  if (ctx) {
    return ctx.instrumenter;
  }
  return noopInstrumenter;
}
