import { PortConflictError } from "./errors.js";
import { assertTransition, type InstanceState } from "./instance-state-machine.js";
import { instanceKey, type RunningInstanceRecord } from "./types.js";

/** Outcome of claiming a port for a backend. */
export type Reservation =
  | { kind: "reserved" }
  /** The same backend is already running there. Nothing was reserved. */
  | { kind: "existing"; record: RunningInstanceRecord }
  /** The same backend holds the port but is not running; the port is reserved for its replacement. */
  | { kind: "replace"; record: RunningInstanceRecord };

/**
 * Process-wide table of managed instances and in-flight port reservations.
 *
 * Every mutation runs under one async lock (a promise chain) so a port check
 * and the claim that follows it are atomic. Long work (launch, health polling)
 * happens outside the lock between two short critical sections.
 */
export class InstanceRegistry {
  private readonly records = new Map<string, RunningInstanceRecord>();
  /** port → backendId for launches that have not registered a record yet. */
  private readonly reservations = new Map<number, string>();
  private tail: Promise<void> = Promise.resolve();

  /** Run `operation` with exclusive access to the registry. Not re-entrant. */
  async withLock<T>(operation: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release = (): void => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }

  /**
   * Claim `port` for `backendId`. Throws PortConflictError when another
   * backend holds it, or when a launch for the same port is already in flight.
   */
  reserve(backendId: string, port: number): Promise<Reservation> {
    return this.withLock(() => {
      const pending = this.reservations.get(port);
      if (pending !== undefined) throw new PortConflictError(port, pending);

      const holder = this.findByPortUnlocked(port);
      if (holder && holder.backendId !== backendId) throw new PortConflictError(port, holder.backendId);

      if (holder) {
        if (holder.healthState === "running") return { kind: "existing", record: holder };
        if (holder.healthState !== "unhealthy") throw new PortConflictError(port, holder.backendId);
        this.reservations.set(port, backendId);
        return { kind: "replace", record: holder };
      }

      this.reservations.set(port, backendId);
      return { kind: "reserved" };
    });
  }

  release(port: number): Promise<void> {
    return this.withLock(() => {
      this.reservations.delete(port);
    });
  }

  /** Register a launched instance and drop the port's reservation. */
  insert(record: RunningInstanceRecord): Promise<RunningInstanceRecord> {
    return this.withLock(() => {
      const key = instanceKey(record.backendId, record.port);
      const holder = this.findByPortUnlocked(record.port);
      if (holder && instanceKey(holder.backendId, holder.port) !== key) {
        throw new PortConflictError(record.port, holder.backendId);
      }
      const frozen = Object.freeze({ ...record });
      this.records.set(key, frozen);
      this.reservations.delete(record.port);
      return frozen;
    });
  }

  /** Move a record to `to` through the state graph. Returns the updated record, or null if it is gone. */
  transition(backendId: string, port: number, to: InstanceState): Promise<RunningInstanceRecord | null> {
    return this.withLock(() => {
      const key = instanceKey(backendId, port);
      const current = this.records.get(key);
      if (!current) return null;
      if (current.healthState === to) return current;
      const next = Object.freeze({ ...current, healthState: assertTransition(current.healthState, to) });
      this.records.set(key, next);
      return next;
    });
  }

  remove(backendId: string, port: number): Promise<boolean> {
    return this.withLock(() => this.records.delete(instanceKey(backendId, port)));
  }

  get(backendId: string, port: number): RunningInstanceRecord | undefined {
    return this.records.get(instanceKey(backendId, port));
  }

  findByBackend(backendId: string): RunningInstanceRecord[] {
    return this.snapshot().filter((r) => r.backendId === backendId);
  }

  findByPort(port: number): RunningInstanceRecord | undefined {
    return this.findByPortUnlocked(port);
  }

  /** Frozen point-in-time copy, sorted by backend then port. */
  snapshot(): readonly RunningInstanceRecord[] {
    const records = [...this.records.values()].sort(
      (a, b) => a.backendId.localeCompare(b.backendId) || a.port - b.port,
    );
    return Object.freeze(records);
  }

  private findByPortUnlocked(port: number): RunningInstanceRecord | undefined {
    for (const record of this.records.values()) {
      if (record.port === port) return record;
    }
    return undefined;
  }
}
