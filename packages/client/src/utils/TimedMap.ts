import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { BinaryHeap } from "./BinaryHeap.js";

export type EvictionListener<K, V> = (key: K, value: V) => void;

type TimedEntry<V> = {
  value: V;
  insertedAt: number;
  ttlMs: number;
  generation: number;
};

type Deadline<K> = {
  key: K;
  generation: number;
};

export type TimedMapOptions = {
  /** Shows up in log lines as `map`. */
  name?: string;
  logger?: AppLogger;
};

/**
 * Map whose entries each expire after their own ttl.
 *
 * Deadlines live in a min-heap and a single timer is armed for the earliest
 * one. An entry stays visible until it is removed or swept; every swept entry
 * is handed to the eviction listeners exactly once. `put` on an existing key
 * starts a new generation, so the old deadline is ignored when it comes due.
 */
export class TimedMap<K, V> {
  private readonly entries = new Map<K, TimedEntry<V>>();
  private readonly deadlines = new BinaryHeap<Deadline<K>>();
  private readonly listeners = new Set<EvictionListener<K, V>>();
  private readonly logger: AppLogger;
  private readonly name: string;
  private timer: NodeJS.Timeout | null = null;
  private armedFor = Number.POSITIVE_INFINITY;
  private generation = 0;
  private closed = false;

  constructor(options: TimedMapOptions = {}) {
    this.name = options.name ?? "timed-map";
    this.logger = options.logger ?? appLogger.child({ subsystem: "timed-map", map: this.name });
  }

  put(key: K, value: V, ttlMs: number): void {
    if (this.closed) {
      return;
    }
    const now = Date.now();
    const safeTtl = Number.isFinite(ttlMs) ? Math.max(0, Math.floor(ttlMs)) : 0;
    this.generation += 1;
    this.entries.set(key, { value, insertedAt: now, ttlMs: safeTtl, generation: this.generation });
    this.deadlines.push({ key, generation: this.generation }, now + safeTtl);
    this.arm();
  }

  get(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /** Removes the entry; its eviction will not fire. */
  remove(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    return entry.value;
  }

  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  onEviction(listener: EvictionListener<K, V>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.entries.clear();
    this.deadlines.clear();
    this.disarm();
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
    this.clear();
  }

  private arm(): void {
    const next = this.deadlines.peekPriority();
    if (next === undefined) {
      this.disarm();
      return;
    }
    if (this.timer && next >= this.armedFor) {
      return;
    }
    this.disarm();
    this.armedFor = next;
    this.timer = setTimeout(() => this.sweep(), Math.max(0, next - Date.now()));
    this.timer.unref();
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.armedFor = Number.POSITIVE_INFINITY;
  }

  private sweep(): void {
    this.timer = null;
    this.armedFor = Number.POSITIVE_INFINITY;
    const now = Date.now();
    for (;;) {
      const due = this.deadlines.peekPriority();
      if (due === undefined || due > now) {
        break;
      }
      const deadline = this.deadlines.pop();
      if (!deadline) {
        break;
      }
      const entry = this.entries.get(deadline.key);
      if (!entry || entry.generation !== deadline.generation) {
        continue;
      }
      this.entries.delete(deadline.key);
      this.notify(deadline.key, entry.value);
    }
    if (!this.closed) {
      this.arm();
    }
  }

  private notify(key: K, value: V): void {
    for (const listener of this.listeners) {
      try {
        listener(key, value);
      } catch (error) {
        this.logger.error(
          { err: normalizeError(error), key: String(key), event: "timed_map.listener_failed" },
          "Eviction listener failed"
        );
      }
    }
  }
}
