import { type BackendCatalog, imageFor } from "../catalog/backend-catalog.js";
import type { ServerDescriptor } from "../catalog/backend-schema.js";
import { logger } from "../config/logger.js";
import type { DevicePassthroughPolicy, DevicePlan } from "../devices/device-policy.js";
import type { ComputeProfile, GpuVendor } from "../hardware/types.js";
import { PortConflictError } from "./errors.js";
import { NetPortProbe, type PortProbe } from "./port-probe.js";
import type { LaunchPlan, RunningInstanceRecord } from "./types.js";

/** Used when neither the user nor the backend definition names a port. */
export const FALLBACK_PORT = 5070;
/** Used when neither the user nor the backend definition names a model. */
export const FALLBACK_MODEL = "unsloth/Llama-3.2-1B-Instruct";

export interface ResolveOverrides {
  model?: string;
  port?: number;
  /** true = --gpu, false = --no-gpu, undefined = backend default. */
  gpu?: boolean;
  mockHardware?: boolean;
  serialDevice?: string;
}

export type ResolveResult =
  | { kind: "plan"; plan: LaunchPlan }
  /** The same backend already runs on the port; its plan comes back unchanged. */
  | { kind: "existing"; plan: LaunchPlan; record: RunningInstanceRecord };

export interface ConfigResolverOptions {
  /** Health-check budget when the backend sets no startup timeout. Default: 30000 */
  healthTimeoutMs?: number;
  portProbe?: PortProbe;
}

/**
 * Turns a backend id, the host profile and user overrides into a LaunchPlan.
 * Every field follows override > backend default > process-wide fallback.
 */
export class ConfigResolver {
  private readonly healthTimeoutMs: number;
  private readonly portProbe: PortProbe;

  constructor(
    private readonly catalog: BackendCatalog,
    private readonly policy: DevicePassthroughPolicy,
    options: ConfigResolverOptions = {},
  ) {
    this.healthTimeoutMs = options.healthTimeoutMs ?? 30_000;
    this.portProbe = options.portProbe ?? new NetPortProbe();
  }

  async resolve(
    backendId: string,
    profile: ComputeProfile,
    overrides: ResolveOverrides,
    registrySnapshot: readonly RunningInstanceRecord[],
  ): Promise<ResolveResult> {
    const descriptor = this.catalog.get(backendId);
    const model = overrides.model ?? descriptor.defaultModel ?? FALLBACK_MODEL;
    const port = overrides.port ?? descriptor.defaultPort ?? FALLBACK_PORT;

    const holder = registrySnapshot.find((r) => r.port === port);
    if (holder && holder.backendId !== backendId) {
      throw new PortConflictError(port, holder.backendId);
    }
    if (holder?.healthState === "running" && holder.plan) {
      logger.info(`${backendId} is already running on port ${port}`);
      return { kind: "existing", plan: holder.plan, record: holder };
    }
    if (!holder && !(await this.portProbe.isFree(port))) {
      throw new PortConflictError(port, null);
    }

    const devices = await this.policy.planDevices(descriptor.requiredDevices, profile, {
      mockHardware: overrides.mockHardware,
      serialDevice: overrides.serialDevice,
      gpu: overrides.gpu,
    });
    const plan = this.buildPlan(descriptor, profile, devices, model, port);

    // An adopted instance without a readable plan label still counts as the same deployment.
    if (holder?.healthState === "running") return { kind: "existing", plan, record: holder };
    return { kind: "plan", plan };
  }

  private buildPlan(
    descriptor: ServerDescriptor,
    profile: ComputeProfile,
    devices: DevicePlan,
    model: string,
    port: number,
  ): LaunchPlan {
    const { gpu } = devices;
    // Apple images are built for arm64 and run CPU-side regardless of GPU passthrough.
    const vendorKey: GpuVendor = gpu.requested || profile.gpuVendor === "apple" ? profile.gpuVendor : "none";
    const imageRef = imageFor(descriptor, vendorKey);

    // An implicit GPU request may retry without passthrough on the CPU image (which can be the same image).
    const fallbackImageRef =
      gpu.requested && !gpu.explicit && profile.gpuVendor !== "apple" ? descriptor.images.cpu : undefined;

    const env: Record<string, string> = { ...descriptor.env, MODEL_ID: model };
    if (descriptor.modelEnv) env[descriptor.modelEnv] = model;
    if (descriptor.requiredDevices.some((c) => c === "serial" || c === "video")) {
      env.MOCK_HARDWARE = devices.hardwareMode === "mock" ? "true" : "false";
      if (devices.hardwareMode === "real" && devices.primarySerial) env.ROBOT_PORT = devices.primarySerial;
    }

    const fill = (template: string, values: Record<string, string>): string =>
      template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);

    const healthTimeoutMs =
      descriptor.startupTimeoutSeconds !== undefined ? descriptor.startupTimeoutSeconds * 1000 : this.healthTimeoutMs;

    return Object.freeze({
      backendId: descriptor.id,
      resolvedModel: model,
      resolvedPort: port,
      containerPort: descriptor.containerPort,
      containerName: fill(descriptor.containerNameTemplate, { backend: descriptor.id, port: String(port) }),
      imageRef,
      fallbackImageRef,
      deviceMappings: devices.deviceMappings,
      env,
      passEnv: [...descriptor.passEnv],
      gpuRequested: gpu.requested,
      gpuExplicit: gpu.explicit,
      gpuVendor: profile.gpuVendor,
      gpuDevicePaths: gpu.devicePaths,
      hardwareMode: devices.hardwareMode,
      command: descriptor.command.map((arg) =>
        fill(arg, { model, port: String(descriptor.containerPort) }),
      ),
      volumes: descriptor.volumes.map((v) => ({ ...v })),
      healthPath: descriptor.healthPath,
      healthTimeoutMs,
    });
  }
}
