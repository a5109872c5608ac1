import { type BackendCatalog, loadBackendCatalog } from "../catalog/backend-catalog.js";
import type { ServerDescriptor } from "../catalog/backend-schema.js";
import { BackendClient, type PredictResponse } from "../client/backend-client.js";
import type { Config } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { DeviceEnumerator } from "../devices/device-enumerator.js";
import { DevicePassthroughPolicy } from "../devices/device-policy.js";
import { HardwareProfiler } from "../hardware/hardware-profiler.js";
import { recommendBackend } from "../hardware/recommend.js";
import type { ComputeProfile } from "../hardware/types.js";
import { type CachedModel, listCachedModels } from "../models/model-cache.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import { DockerRuntime } from "../runtime/docker-runtime.js";
import { type SessionRecord, StateStore } from "../state/state-store.js";
import { ConfigResolver, FALLBACK_PORT, type ResolveOverrides } from "./config-resolver.js";
import { HealthMonitor, type HealthMonitorOptions } from "./health-monitor.js";
import { InstanceRegistry } from "./instance-registry.js";
import { LifecycleManager, type StoppedInstance } from "./lifecycle-manager.js";
import type { PortProbe } from "./port-probe.js";
import type { LaunchPlan, RunningInstanceRecord } from "./types.js";

/** Collaborators a session builds by default; tests swap in fakes. */
export interface SessionDeps {
  catalog?: BackendCatalog;
  profiler?: HardwareProfiler;
  runtime?: ContainerRuntime;
  enumerator?: DeviceEnumerator;
  portProbe?: PortProbe;
  monitor?: HealthMonitorOptions;
  hostEnv?: NodeJS.ProcessEnv;
}

export interface ServeResult {
  record: RunningInstanceRecord;
  plan: LaunchPlan;
  /** True when the backend was already running and nothing was started. */
  reused: boolean;
}

export interface InstanceStatus {
  record: RunningInstanceRecord;
  /** Live probe result; null when not probed. */
  live: boolean | null;
}

/**
 * One CLI invocation's view of the world: the catalog, the hardware profile,
 * the last session record, and a registry rebuilt from the containers earlier
 * invocations started. The registry is only rebuilt by commands that touch
 * the container runtime.
 */
export class Session {
  private recovery: Promise<void> | null = null;

  private constructor(
    readonly config: Config,
    readonly catalog: BackendCatalog,
    private readonly profiler: HardwareProfiler,
    private readonly resolver: ConfigResolver,
    private readonly registry: InstanceRegistry,
    private readonly monitor: HealthMonitor,
    readonly lifecycle: LifecycleManager,
    private readonly store: StateStore,
    private last: SessionRecord | null,
  ) {}

  /** Wire the components and read the persisted session record. */
  static async open(config: Config, deps: SessionDeps = {}): Promise<Session> {
    const catalog = deps.catalog ?? loadBackendCatalog(config.catalogDir);
    const runtime =
      deps.runtime ?? new DockerRuntime({ socketPath: config.docker.socketPath, imagePull: config.docker.imagePull });
    const registry = new InstanceRegistry();
    const monitor = new HealthMonitor(registry, runtime, deps.monitor);
    const lifecycle = new LifecycleManager(registry, runtime, monitor, {
      launchTimeoutMs: config.timeouts.launchMs,
      stopGraceSeconds: config.timeouts.stopGraceSeconds,
      hostEnv: deps.hostEnv,
    });
    const resolver = new ConfigResolver(catalog, new DevicePassthroughPolicy(deps.enumerator), {
      healthTimeoutMs: config.timeouts.healthMs,
      portProbe: deps.portProbe,
    });

    const store = new StateStore(config.home);
    return new Session(
      config,
      catalog,
      deps.profiler ?? new HardwareProfiler(),
      resolver,
      registry,
      monitor,
      lifecycle,
      store,
      await store.read(),
    );
  }

  profile(): Promise<ComputeProfile> {
    return this.profiler.detect();
  }

  async describeHardware(): Promise<{ profile: ComputeProfile; recommended: string }> {
    const profile = await this.profile();
    return { profile, recommended: recommendBackend(profile) };
  }

  /** Resolve, start and health-check a backend. Persists the session record on success. */
  async serve(
    backendId: string,
    overrides: ResolveOverrides = {},
    options: { signal?: AbortSignal } = {},
  ): Promise<ServeResult> {
    await this.recovered();
    const profile = await this.profile();
    const resolved = await this.resolver.resolve(
      backendId,
      profile,
      { ...overrides, mockHardware: overrides.mockHardware ?? this.config.mockHardware },
      this.registry.snapshot(),
    );

    if (resolved.kind === "existing") {
      await this.remember(profile, resolved.record);
      return { record: resolved.record, plan: resolved.plan, reused: true };
    }

    const record = await this.lifecycle.start(resolved.plan, options);
    await this.remember(profile, record);
    return { record, plan: resolved.plan, reused: false };
  }

  async stop(backendId?: string): Promise<StoppedInstance[]> {
    await this.recovered();
    return this.lifecycle.stop(backendId);
  }

  async status(options: { probe?: boolean } = {}): Promise<InstanceStatus[]> {
    await this.recovered();
    const records = this.lifecycle.status();
    if (!options.probe) return records.map((record) => ({ record, live: null }));
    return Promise.all(records.map(async (record) => ({ record, live: await this.monitor.probe(record) })));
  }

  async list(): Promise<{ backends: ServerDescriptor[]; models: CachedModel[] }> {
    return { backends: this.catalog.list(), models: await listCachedModels(this.config.hfCacheDir) };
  }

  /**
   * Send one observation to a robot-control backend. The port defaults to the
   * running instance's, then the last session's, then the backend default.
   */
  async predict(
    backendId: string,
    request: { state: number[]; task?: string; image?: string; port?: number },
  ): Promise<PredictResponse> {
    const descriptor = this.catalog.get(backendId);
    const port = request.port ?? (await this.portFor(descriptor));
    const client = new BackendClient(port);
    return client.predict({ state: request.state, task: request.task, image: request.image });
  }

  /** The record read at open, or the one the last serve wrote. */
  lastSession(): SessionRecord | null {
    return this.last;
  }

  /** Adopt instances that are already running, once per session. */
  private recovered(): Promise<void> {
    if (!this.recovery) {
      this.recovery = this.lifecycle.recover().then(
        (adopted) => {
          if (adopted.length > 0) logger.debug(`Recovered ${adopted.length} running instance(s)`);
        },
        (err: unknown) => {
          this.recovery = null;
          throw err;
        },
      );
    }
    return this.recovery;
  }

  private async portFor(descriptor: ServerDescriptor): Promise<number> {
    await this.recovered();
    const running = this.registry.findByBackend(descriptor.id)[0];
    if (running) return running.port;
    if (this.last?.backend === descriptor.id) return this.last.port;
    return descriptor.defaultPort ?? FALLBACK_PORT;
  }

  private async remember(profile: ComputeProfile, record: RunningInstanceRecord): Promise<void> {
    const next: SessionRecord = {
      hardwareProfile: { ...profile },
      backend: record.backendId,
      model: record.model,
      port: record.port,
      lastUsedAt: new Date().toISOString(),
    };
    this.last = next;
    try {
      await this.store.write(next);
    } catch (err) {
      logger.warn(`Could not write session record to ${this.store.path}`, { err });
    }
  }
}
