import type { EventRecord, EventSink } from "./types.js";

export class EventBuffer {
  private events: EventRecord[] = [];
  private sink: EventSink;
  private maxSize: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(sink: EventSink, maxSize = 500, flushIntervalMs = 100) {
    this.sink = sink;
    this.maxSize = maxSize;
    if (flushIntervalMs > 0) {
      const timer = setInterval(() => void this.flush(), flushIntervalMs);
      timer.unref();
      this.timer = timer;
    }
  }

  get pending(): number {
    return this.events.length;
  }

  enqueue(event: EventRecord): void {
    this.events.push(event);
    if (this.events.length >= this.maxSize) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.events.length === 0) return;
    const batch = this.events.splice(0);
    try {
      await this.sink(batch);
    } catch (err) {
      console.error("ERROR: event buffer flush failed:", err);
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    // Final flush
    await this.flush();
  }
}

export const consoleSink: EventSink = async (batch) => {
  for (const e of batch) {
    console.log(
      `INFO: [${e.trace_id}] ${e.source}/${e.component} ${e.action} status=${e.status ?? "-"} ${e.duration_ms ?? 0}ms`,
    );
  }
};
