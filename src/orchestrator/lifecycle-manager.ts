import { logger } from "../config/logger.js";
import {
  type ContainerLaunchSpec,
  type ContainerRuntime,
  type ContainerState,
  ImagePullError,
  LABELS,
  type LaunchedContainer,
} from "../runtime/container-runtime.js";
import {
  ContainerLaunchError,
  HealthCheckTimeoutError,
  NotRunningError,
  OrchestratorError,
  StartCancelledError,
  StopFailedError,
  type StopFailure,
} from "./errors.js";
import type { HealthMonitor, HealthOutcome } from "./health-monitor.js";
import type { InstanceRegistry } from "./instance-registry.js";
import { assertTransition, type InstanceState } from "./instance-state-machine.js";
import { type LaunchPlan, launchPlanSchema, type RunningInstanceRecord } from "./types.js";

export interface LifecycleManagerOptions {
  /** Launch budget (image pull included) in ms. Default: 300000 */
  launchTimeoutMs?: number;
  /** Seconds between SIGTERM and SIGKILL. Default: 10 */
  stopGraceSeconds?: number;
  /** Source of the variables named in a plan's passEnv. Default: process.env */
  hostEnv?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface StoppedInstance {
  backendId: string;
  port: number;
}

/** Runtime messages that point at GPU passthrough rather than the image or the daemon. */
const GPU_FAILURE_RE = /could not select device driver|nvidia|\bgpu\b|\/dev\/kfd|\/dev\/dri|rocm/i;

/**
 * Drives instances through planned → starting → health_checking → running
 * and back down through stopping → stopped. Owns the only writes to the
 * registry besides the health monitor's state updates.
 */
export class LifecycleManager {
  private readonly launchTimeoutMs: number;
  private readonly stopGraceSeconds: number;
  private readonly hostEnv: NodeJS.ProcessEnv;
  private readonly now: () => Date;

  constructor(
    private readonly registry: InstanceRegistry,
    private readonly runtime: ContainerRuntime,
    private readonly monitor: HealthMonitor,
    options: LifecycleManagerOptions = {},
  ) {
    this.launchTimeoutMs = options.launchTimeoutMs ?? 300_000;
    this.stopGraceSeconds = options.stopGraceSeconds ?? 10;
    this.hostEnv = options.hostEnv ?? process.env;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start the instance described by `plan` and wait until it is healthy.
   * Returns the existing record when the same backend already runs on the port.
   */
  async start(plan: LaunchPlan, options: { signal?: AbortSignal } = {}): Promise<RunningInstanceRecord> {
    const { backendId, resolvedPort: port } = plan;
    const { signal } = options;

    const reservation = await this.registry.reserve(backendId, port);
    if (reservation.kind === "existing") {
      logger.info(`${backendId} already running on port ${port}`);
      return reservation.record;
    }
    if (reservation.kind === "replace") {
      await this.replaceUnhealthy(reservation.record);
    }

    let state: InstanceState = "planned";
    state = assertTransition(state, "starting");
    logger.info(`Starting ${backendId} on port ${port}`, { image: plan.imageRef, hardwareMode: plan.hardwareMode });

    let launched: LaunchedContainer & { imageRef: string };
    try {
      launched = await this.launchWithFallback(plan, signal);
    } catch (err) {
      state = assertTransition(state, "unhealthy");
      await this.registry.release(port);
      if (signal?.aborted) throw new StartCancelledError(backendId);
      if (err instanceof OrchestratorError) throw err;
      throw new ContainerLaunchError(backendId, errorMessage(err), err);
    }

    state = assertTransition(state, "health_checking");
    const record = await this.registry.insert({
      backendId,
      model: plan.resolvedModel,
      containerId: launched.containerId,
      containerName: launched.containerName,
      port,
      imageRef: launched.imageRef,
      hardwareMode: plan.hardwareMode,
      startedAt: this.now().toISOString(),
      healthState: state,
      plan,
    });

    let outcome: HealthOutcome;
    try {
      outcome = await this.monitor.awaitReady(record, { timeoutMs: plan.healthTimeoutMs, signal });
    } catch (err) {
      // The container may still come up; leave it registered as unhealthy so a re-serve replaces it.
      await this.registry.transition(backendId, port, "unhealthy");
      throw new ContainerLaunchError(backendId, `health check failed: ${errorMessage(err)}`, err);
    }
    switch (outcome.status) {
      case "ready":
        return this.registry.get(backendId, port) ?? record;
      case "timeout":
        throw new HealthCheckTimeoutError(backendId, port, plan.healthTimeoutMs);
      case "exited":
        await this.registry.remove(backendId, port);
        await this.bestEffortTerminate(record.containerId);
        throw new ContainerLaunchError(
          backendId,
          `container exited${outcome.exitCode === null ? "" : ` with code ${outcome.exitCode}`} during health check`,
        );
      case "cancelled":
        await this.registry.transition(backendId, port, "stopping");
        await this.bestEffortTerminate(record.containerId);
        await this.registry.transition(backendId, port, "stopped");
        await this.registry.remove(backendId, port);
        throw new StartCancelledError(backendId);
    }
  }

  /**
   * Stop every instance of `backendId`, or every instance when omitted.
   * Failures are collected, never short-circuited.
   */
  async stop(backendId?: string): Promise<StoppedInstance[]> {
    const targets = backendId === undefined ? this.registry.snapshot() : this.registry.findByBackend(backendId);
    if (backendId !== undefined && targets.length === 0) throw new NotRunningError(backendId);

    const stopped: StoppedInstance[] = [];
    const failures: StopFailure[] = [];
    const results = await Promise.allSettled(targets.map((record) => this.stopOne(record)));
    results.forEach((result, i) => {
      const { backendId: id, port } = targets[i];
      if (result.status === "fulfilled") stopped.push({ backendId: id, port });
      else failures.push({ backendId: id, port, error: toError(result.reason) });
    });

    if (failures.length > 0) throw new StopFailedError(stopped, failures);
    return stopped;
  }

  /** Frozen snapshot of every managed instance. */
  status(): readonly RunningInstanceRecord[] {
    return this.registry.snapshot();
  }

  /** Register instances recovered from the runtime (a previous process started them). */
  async adopt(records: readonly RunningInstanceRecord[]): Promise<void> {
    for (const record of records) {
      await this.registry.insert(record);
      logger.debug(`Adopted ${record.backendId} on port ${record.port}`, { containerId: record.containerId });
    }
  }

  /**
   * Rebuild the registry from the runtime's managed containers. Exited
   * containers are crashes: they are reported and left out.
   */
  async recover(): Promise<RunningInstanceRecord[]> {
    const containers = await this.runtime.listManaged();
    const candidates: RunningInstanceRecord[] = [];
    for (const container of containers) {
      if (!container.running) {
        logger.warn(`Container ${container.containerName} is no longer running`, { exitCode: container.exitCode });
        continue;
      }
      const base = recordFromContainer(container);
      if (!base) {
        logger.warn(`Ignoring container ${container.containerName} with incomplete labels`);
        continue;
      }
      candidates.push(base);
    }
    const records = await Promise.all(
      candidates.map(async (base): Promise<RunningInstanceRecord> => ({
        ...base,
        healthState: (await this.monitor.probe(base)) ? "running" : "unhealthy",
      })),
    );
    await this.adopt(records);
    return records;
  }

  private async stopOne(record: RunningInstanceRecord): Promise<void> {
    await this.registry.transition(record.backendId, record.port, "stopping");
    try {
      await this.runtime.terminate(record.containerId, this.stopGraceSeconds);
    } catch (err) {
      await this.registry.transition(record.backendId, record.port, "unhealthy");
      throw err;
    }
    await this.registry.transition(record.backendId, record.port, "stopped");
    await this.registry.remove(record.backendId, record.port);
    logger.info(`Stopped ${record.backendId} on port ${record.port}`);
  }

  private async replaceUnhealthy(record: RunningInstanceRecord): Promise<void> {
    logger.info(`Replacing unhealthy ${record.backendId} on port ${record.port}`);
    try {
      await this.registry.transition(record.backendId, record.port, "stopping");
      await this.runtime.terminate(record.containerId, this.stopGraceSeconds);
    } catch (err) {
      await this.registry.release(record.port);
      throw new ContainerLaunchError(record.backendId, "could not remove the unhealthy instance", err);
    }
    await this.registry.remove(record.backendId, record.port);
  }

  /** Launch once; on a GPU-related failure of an implicit GPU request, retry once on the CPU image. */
  private async launchWithFallback(
    plan: LaunchPlan,
    signal?: AbortSignal,
  ): Promise<LaunchedContainer & { imageRef: string }> {
    try {
      const launched = await this.launchBounded(this.launchSpec(plan, plan.imageRef, true), signal);
      return { ...launched, imageRef: plan.imageRef };
    } catch (err) {
      const fallback = plan.fallbackImageRef;
      if (!fallback || !plan.gpuRequested || plan.gpuExplicit || signal?.aborted) throw err;
      if (!isGpuFailure(err, plan.imageRef)) throw err;
      logger.warn(`GPU launch of ${plan.backendId} failed; retrying on ${fallback}`, { err });
      const launched = await this.launchBounded(this.launchSpec(plan, fallback, false), signal);
      return { ...launched, imageRef: fallback };
    }
  }

  /** runtime.launch bounded by the launch timeout and the caller's signal. */
  private launchBounded(spec: ContainerLaunchSpec, signal?: AbortSignal): Promise<LaunchedContainer> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) controller.abort(signal.reason);

    const launch = this.runtime.launch(spec, controller.signal);
    return new Promise<LaunchedContainer>((resolve, reject) => {
      let settled = false;
      const finish = (): void => {
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const abandon = (reason: Error): void => {
        if (settled) return;
        finish();
        controller.abort(reason);
        // A launch that completes after we gave up leaves a container nobody tracks.
        launch
          .then((late) => this.bestEffortTerminate(late.containerId))
          .catch((err: unknown) => logger.debug(`Abandoned launch of ${spec.name} failed`, { err }));
        reject(reason);
      };
      const timer = setTimeout(
        () => abandon(new Error(`launch did not finish within ${Math.round(this.launchTimeoutMs / 1000)}s`)),
        this.launchTimeoutMs,
      );
      controller.signal.addEventListener("abort", () => abandon(toError(controller.signal.reason)), { once: true });
      if (controller.signal.aborted) abandon(toError(controller.signal.reason));

      launch.then(
        (launched) => {
          if (settled) return;
          finish();
          resolve(launched);
        },
        (err: unknown) => {
          if (settled) return;
          finish();
          reject(err);
        },
      );
    });
  }

  private launchSpec(plan: LaunchPlan, image: string, withGpu: boolean): ContainerLaunchSpec {
    const env: Record<string, string> = { ...plan.env };
    for (const name of plan.passEnv) {
      const value = this.hostEnv[name];
      if (value) env[name] = value;
    }
    const useGpu = withGpu && plan.gpuRequested;
    return {
      name: plan.containerName,
      image,
      command: [...plan.command],
      env,
      labels: {
        [LABELS.managed]: "true",
        [LABELS.backend]: plan.backendId,
        [LABELS.port]: String(plan.resolvedPort),
        [LABELS.model]: plan.resolvedModel,
        [LABELS.hardwareMode]: plan.hardwareMode,
        [LABELS.plan]: JSON.stringify(plan),
      },
      hostPort: plan.resolvedPort,
      containerPort: plan.containerPort,
      devices: [
        ...plan.deviceMappings,
        ...(useGpu ? plan.gpuDevicePaths.map((p) => ({ hostPath: p, containerPath: p })) : []),
      ],
      gpu: useGpu ? plan.gpuVendor : null,
      volumes: plan.volumes.map((v) => ({ ...v })),
    };
  }

  private async bestEffortTerminate(containerId: string): Promise<void> {
    try {
      await this.runtime.terminate(containerId, this.stopGraceSeconds);
    } catch (err) {
      logger.warn(`Failed to clean up container ${containerId}`, { err });
    }
  }
}

/**
 * Rebuild a record from a managed container's labels. Returns null when the
 * mandatory labels are missing; an unreadable plan label only drops the plan.
 */
export function recordFromContainer(container: ContainerState): RunningInstanceRecord | null {
  const { labels } = container;
  const backendId = labels[LABELS.backend];
  const port = Number(labels[LABELS.port]);
  if (!backendId || !Number.isInteger(port) || port < 1 || port > 65535) return null;

  let plan: LaunchPlan | null = null;
  const rawPlan = labels[LABELS.plan];
  if (rawPlan) {
    try {
      const parsed = launchPlanSchema.safeParse(JSON.parse(rawPlan));
      if (parsed.success) plan = parsed.data;
    } catch (err) {
      logger.debug(`Unreadable plan label on ${container.containerName}`, { err });
    }
  }

  return {
    backendId,
    model: labels[LABELS.model] ?? plan?.resolvedModel ?? "unknown",
    containerId: container.containerId,
    containerName: container.containerName,
    port,
    imageRef: plan?.imageRef ?? "unknown",
    hardwareMode: labels[LABELS.hardwareMode] === "mock" ? "mock" : "real",
    startedAt: container.startedAt ?? new Date(0).toISOString(),
    healthState: "running",
    plan,
  };
}

/**
 * Pull failures never count, and the image reference is cut out of the
 * message first: `rocm/vllm:latest` or `ollama/ollama:rocm` name a vendor
 * without saying anything about passthrough.
 */
function isGpuFailure(err: unknown, image: string): boolean {
  if (err instanceof ImagePullError) return false;
  const repository = image.replace(/[:@][^/]*$/, "");
  const message = errorMessage(err).split(image).join("").split(repository).join("");
  return GPU_FAILURE_RE.test(message);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
