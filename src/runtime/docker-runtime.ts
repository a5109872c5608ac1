import { homedir } from "node:os";
import Docker from "dockerode";
import type { VolumeSpec } from "../catalog/backend-schema.js";
import { logger } from "../config/logger.js";
import type { GpuVendor } from "../hardware/types.js";
import {
  type ContainerLaunchSpec,
  type ContainerRuntime,
  type ContainerState,
  ImagePullError,
  type ImagePullPolicy,
  LABELS,
  type LaunchedContainer,
} from "./container-runtime.js";

export interface DockerRuntimeOptions {
  docker?: Docker;
  socketPath?: string;
  imagePull?: ImagePullPolicy;
  /** Registry credentials for private images. */
  auth?: { username: string; password: string; serveraddress?: string };
}

/**
 * Container runtime backed by the Docker Engine API through dockerode.
 * Uses the SDK exclusively; nothing shells out to the docker CLI.
 */
export class DockerRuntime implements ContainerRuntime {
  readonly docker: Docker;
  private readonly imagePull: ImagePullPolicy;
  private readonly auth: DockerRuntimeOptions["auth"];

  constructor(options: DockerRuntimeOptions = {}) {
    this.docker = options.docker ?? new Docker({ socketPath: options.socketPath ?? "/var/run/docker.sock" });
    this.imagePull = options.imagePull ?? "missing";
    this.auth = options.auth;
  }

  async launch(spec: ContainerLaunchSpec, signal?: AbortSignal): Promise<LaunchedContainer> {
    try {
      await this.ensureImage(spec.image);
    } catch (err) {
      throw new ImagePullError(spec.image, err);
    }
    signal?.throwIfAborted();

    await this.removeStale(spec.name);

    const portKey = `${spec.containerPort}/tcp`;
    const hostConfig: Docker.ContainerCreateOptions["HostConfig"] = {
      PortBindings: { [portKey]: [{ HostPort: String(spec.hostPort) }] },
      Binds: spec.volumes.length > 0 ? spec.volumes.map(toBind) : undefined,
      Devices: spec.devices.map((d) => ({
        PathOnHost: d.hostPath,
        PathInContainer: d.containerPath,
        CgroupPermissions: "rwm",
      })),
      ...gpuHostConfig(spec.gpu),
    };

    const container = await this.docker.createContainer({
      Image: spec.image,
      name: spec.name,
      Cmd: spec.command.length > 0 ? spec.command : undefined,
      Env: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
      Labels: spec.labels,
      ExposedPorts: { [portKey]: {} },
      HostConfig: hostConfig,
    });

    try {
      await container.start();
    } catch (err) {
      // Created but not started (bad device, missing GPU driver): clean up the husk.
      await container.remove({ force: true }).catch((removeErr: unknown) => {
        logger.warn(`Failed to remove container ${spec.name} after start failure`, { err: removeErr });
      });
      throw err;
    }

    logger.info(`Started container ${spec.name}`, { containerId: container.id, image: spec.image });
    return { containerId: container.id, containerName: spec.name };
  }

  async terminate(containerId: string, graceSeconds: number): Promise<void> {
    const container = this.docker.getContainer(containerId);
    try {
      // Docker sends SIGTERM, waits t seconds, then SIGKILL.
      await container.stop({ t: graceSeconds });
    } catch (err) {
      // Docker 304: container already stopped. 404: already gone.
      if (statusCode(err) === 404) return;
      const msg = err instanceof Error ? err.message : String(err);
      if (statusCode(err) !== 304 && !msg.includes("container already stopped")) throw err;
    }
    try {
      await container.remove({ force: true });
    } catch (err) {
      if (statusCode(err) !== 404) throw err;
    }
  }

  async inspect(containerId: string): Promise<ContainerState | null> {
    try {
      const info = await this.docker.getContainer(containerId).inspect();
      return {
        containerId: info.Id,
        containerName: info.Name.replace(/^\//, ""),
        running: info.State.Running,
        exitCode: info.State.Running ? null : info.State.ExitCode,
        labels: info.Config.Labels ?? {},
        startedAt: info.State.StartedAt || null,
      };
    } catch (err) {
      if (statusCode(err) === 404) return null;
      throw err;
    }
  }

  async listManaged(): Promise<ContainerState[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [`${LABELS.managed}=true`] },
    });
    return containers.map((c) => ({
      containerId: c.Id,
      containerName: (c.Names[0] ?? c.Id).replace(/^\//, ""),
      running: c.State === "running",
      exitCode: parseExitCode(c.Status),
      labels: c.Labels ?? {},
      startedAt: c.Created ? new Date(c.Created * 1000).toISOString() : null,
    }));
  }

  private async ensureImage(image: string): Promise<void> {
    if (this.imagePull === "never") return;
    if (this.imagePull === "missing") {
      try {
        await this.docker.getImage(image).inspect();
        return;
      } catch (err) {
        if (statusCode(err) !== 404) throw err;
      }
    }
    await this.pullImage(image);
  }

  private async pullImage(image: string): Promise<void> {
    logger.info(`Pulling image ${image}`);
    const stream = await this.docker.pull(image, this.auth ? { authconfig: this.auth } : {});
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** A leftover container under the same name (exited, never cleaned up) blocks create. */
  private async removeStale(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).remove({ force: true });
      logger.info(`Removed stale container ${name}`);
    } catch (err) {
      if (statusCode(err) !== 404) throw err;
    }
  }
}

function gpuHostConfig(vendor: GpuVendor | null): Partial<NonNullable<Docker.ContainerCreateOptions["HostConfig"]>> {
  switch (vendor) {
    case "nvidia":
      return { DeviceRequests: [{ Driver: "nvidia", Count: -1, Capabilities: [["gpu"]] }] };
    case "amd":
      // /dev/kfd and /dev/dri arrive through `devices`; ROCm also needs the video group.
      return { GroupAdd: ["video"] };
    case "apple":
      logger.warn("Docker on macOS cannot pass the Apple GPU through; the container will use the CPU");
      return {};
    default:
      return {};
  }
}

function toBind(volume: VolumeSpec): string {
  const source = volume.source.startsWith("~") ? `${homedir()}${volume.source.slice(1)}` : volume.source;
  return `${source}:${volume.target}${volume.readonly ? ":ro" : ""}`;
}

/** "Exited (137) 2 minutes ago" → 137. */
function parseExitCode(status: string): number | null {
  const match = /Exited \((\d+)\)/.exec(status);
  return match ? Number(match[1]) : null;
}

function statusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}
