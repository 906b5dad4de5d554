import type { DatabaseGroupsConfig } from "../config/index.js";
import { Store } from "./postgres.js";

/**
 * Lazily connected stores keyed by connection group name. A rule can target
 * a group through the submission; everything else uses the default group.
 */
export class ConnectionGroups {
  private stores = new Map<string, Store>();
  private connecting = new Map<string, Promise<Store>>();
  private config: DatabaseGroupsConfig;
  private connector: (name: string) => Promise<Store>;

  constructor(
    config: DatabaseGroupsConfig,
    connector?: (name: string) => Promise<Store>,
  ) {
    this.config = config;
    this.connector = connector ?? ((name) => this.connectGroup(name));
  }

  get defaultGroup(): string {
    return this.config.default_group;
  }

  has(name: string): boolean {
    return Object.hasOwn(this.config.groups, name);
  }

  async get(name?: string | null): Promise<Store> {
    const group = name || this.config.default_group;
    const cached = this.stores.get(group);
    if (cached) return cached;

    // Guard against concurrent connects for the same group
    const inflight = this.connecting.get(group);
    if (inflight) return inflight;

    const promise = this.connector(group);
    this.connecting.set(group, promise);
    try {
      const store = await promise;
      // closeAll() may have claimed this connect while it was pending
      if (this.connecting.get(group) === promise) {
        this.stores.set(group, store);
      }
      return store;
    } finally {
      if (this.connecting.get(group) === promise) {
        this.connecting.delete(group);
      }
    }
  }

  /** Closes every connected store, including connects still in flight. */
  async closeAll(): Promise<void> {
    const pending = Array.from(this.connecting.values());
    this.connecting.clear();
    const stores = new Set(this.stores.values());
    this.stores.clear();

    for (const result of await Promise.allSettled(pending)) {
      if (result.status === "fulfilled") stores.add(result.value);
    }
    await Promise.all(Array.from(stores, (s) => s.close()));
  }

  private async connectGroup(name: string): Promise<Store> {
    const cfg = this.config.groups[name];
    if (!cfg) {
      throw new Error(`Unknown database group: ${name}`);
    }
    const store = await Store.connect(cfg);
    console.log(`INFO: database group ${name} connected (${cfg.driver})`);
    return store;
  }
}
