export interface EventRecord {
  trace_id: string;
  span_id: string;
  parent_span_id: string | null;
  source: string;
  component: string;
  action: string;
  duration_ms: number | null;
  status: string | null;
  metadata: Record<string, unknown> | null;
}

export interface Span {
  end(): void;
  setStatus(status: string): void;
  setMetadata(key: string, value: unknown): void;
  readonly traceId: string;
  readonly spanId: string;
}

export interface Instrumenter {
  startSpan(source: string, component: string, action: string): Span;
}

/** Receives flushed batches of events. */
export type EventSink = (batch: EventRecord[]) => Promise<void>;
