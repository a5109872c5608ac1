import { logger } from "../config/logger.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import type { InstanceRegistry } from "./instance-registry.js";
import type { RunningInstanceRecord } from "./types.js";

export interface HealthMonitorOptions {
  /** First wait between probes in ms. Default: 500 */
  initialIntervalMs?: number;
  /** Backoff ceiling in ms. Default: 5000 */
  maxIntervalMs?: number;
  /** Per-probe fetch timeout in ms. Default: 2000 */
  probeTimeoutMs?: number;
  /** Host the published ports are reached on. Default: 127.0.0.1 */
  host?: string;
}

export type HealthOutcome =
  | { status: "ready"; attempts: number; elapsedMs: number }
  | { status: "timeout"; attempts: number; elapsedMs: number }
  | { status: "exited"; exitCode: number | null }
  | { status: "cancelled" };

/**
 * Polls a started instance's health endpoint until it answers, the budget
 * runs out or the container dies. Intervals double from the initial value up
 * to the ceiling.
 */
export class HealthMonitor {
  private readonly initialIntervalMs: number;
  private readonly maxIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly host: string;

  constructor(
    private readonly registry: InstanceRegistry,
    private readonly runtime: ContainerRuntime,
    options: HealthMonitorOptions = {},
  ) {
    this.initialIntervalMs = options.initialIntervalMs ?? 500;
    this.maxIntervalMs = options.maxIntervalMs ?? 5_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 2_000;
    this.host = options.host ?? "127.0.0.1";
  }

  /**
   * Wait for `record` to become ready. Moves the record to `running` on
   * success and to `unhealthy` on timeout; exit and cancellation are left to
   * the caller.
   */
  async awaitReady(
    record: RunningInstanceRecord,
    options: { timeoutMs: number; signal?: AbortSignal },
  ): Promise<HealthOutcome> {
    const started = Date.now();
    const deadline = started + options.timeoutMs;
    let interval = this.initialIntervalMs;
    let attempts = 0;

    for (;;) {
      if (options.signal?.aborted) return { status: "cancelled" };

      const container = await this.runtime.inspect(record.containerId);
      if (!container?.running) {
        logger.warn(`Container ${record.containerName} exited during health check`, {
          exitCode: container?.exitCode ?? null,
        });
        return { status: "exited", exitCode: container?.exitCode ?? null };
      }

      attempts++;
      if (await this.probe(record)) {
        await this.registry.transition(record.backendId, record.port, "running");
        const elapsedMs = Date.now() - started;
        logger.info(`${record.backendId} on port ${record.port} is ready`, { attempts, elapsedMs });
        return { status: "ready", attempts, elapsedMs };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        await this.registry.transition(record.backendId, record.port, "unhealthy");
        return { status: "timeout", attempts, elapsedMs: Date.now() - started };
      }

      logger.debug(`${record.backendId} not ready yet; retrying in ${Math.min(interval, remaining)}ms`);
      await sleep(Math.min(interval, remaining), options.signal);
      interval = Math.min(interval * 2, this.maxIntervalMs);
    }
  }

  /** One liveness check: true when the health endpoint answers 2xx. */
  async probe(record: Pick<RunningInstanceRecord, "port" | "plan">): Promise<boolean> {
    const path = record.plan?.healthPath ?? "/health";
    try {
      const res = await fetch(`http://${this.host}:${record.port}${path}`, {
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}

/** Resolves after `ms`, or early when `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
