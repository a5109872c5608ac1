import type { VolumeSpec } from "../catalog/backend-schema.js";
import type { GpuVendor } from "../hardware/types.js";

/** Label keys stamped on every managed container. */
export const LABELS = {
  managed: "aiserve.managed",
  backend: "aiserve.backend",
  port: "aiserve.port",
  model: "aiserve.model",
  hardwareMode: "aiserve.hardware-mode",
  plan: "aiserve.plan",
} as const;

export type ImagePullPolicy = "always" | "missing" | "never";

export interface ContainerLaunchSpec {
  name: string;
  image: string;
  command: string[];
  env: Record<string, string>;
  labels: Record<string, string>;
  hostPort: number;
  containerPort: number;
  devices: Array<{ hostPath: string; containerPath: string }>;
  /** Null when the container runs without GPU passthrough. */
  gpu: GpuVendor | null;
  volumes: VolumeSpec[];
}

export interface LaunchedContainer {
  containerId: string;
  containerName: string;
}

export interface ContainerState {
  containerId: string;
  containerName: string;
  running: boolean;
  exitCode: number | null;
  labels: Record<string, string>;
  /** ISO-8601, or null when the runtime does not report it. */
  startedAt: string | null;
}

/** The image could not be found or pulled. Nothing was created. */
export class ImagePullError extends Error {
  readonly name = "ImagePullError" as const;
  readonly image: string;
  constructor(image: string, cause: unknown) {
    super(`Cannot pull image ${image}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.image = image;
  }
}

/**
 * Capability interface the lifecycle code drives. The Docker adapter is the
 * production implementation; tests use an in-memory fake.
 */
export interface ContainerRuntime {
  /** Create and start a container. Rejects with ImagePullError when the image is unavailable. */
  launch(spec: ContainerLaunchSpec, signal?: AbortSignal): Promise<LaunchedContainer>;
  /** SIGTERM, wait `graceSeconds`, SIGKILL, then remove. A missing container is not an error. */
  terminate(containerId: string, graceSeconds: number): Promise<void>;
  /** Null when the container no longer exists. */
  inspect(containerId: string): Promise<ContainerState | null>;
  /** Every container carrying the managed label, running or not. */
  listManaged(): Promise<ContainerState[]>;
}
