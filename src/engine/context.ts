import type { Config } from "../config/index.js";
import { EventBuffer, consoleSink } from "../instrument/buffer.js";
import { runTraced } from "../instrument/instrument.js";
import type { EventSink } from "../instrument/types.js";
import { ConnectionGroups } from "../store/groups.js";
import type { Store } from "../store/postgres.js";
import { StoreExistenceChecker } from "./existence.js";
import type { RuleContext } from "./unique.js";

export interface RuleEngine {
  context: RuleContext;
  groups: ConnectionGroups;
  events: EventBuffer | null;
  /** Runs `fn` inside a trace when instrumentation is enabled. */
  traced<T>(fn: () => T): T;
  close(): Promise<void>;
}

export interface RuleEngineOptions {
  sink?: EventSink;
  connector?: (group: string) => Promise<Store>;
}

export function createRuleEngine(cfg: Config, opts: RuleEngineOptions = {}): RuleEngine {
  const groups = new ConnectionGroups(cfg.database, opts.connector);
  const events = cfg.instrumentation.enabled
    ? new EventBuffer(
        opts.sink ?? consoleSink,
        cfg.instrumentation.buffer_size,
        cfg.instrumentation.flush_interval_ms,
      )
    : null;

  return {
    context: { existence: new StoreExistenceChecker(groups) },
    groups,
    events,
    traced<T>(fn: () => T): T {
      return events ? runTraced(events, fn) : fn();
    },
    async close(): Promise<void> {
      await events?.stop();
      await groups.closeAll();
    },
  };
}
