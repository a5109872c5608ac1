import type { DeviceClass } from "../catalog/backend-schema.js";
import { logger } from "../config/logger.js";
import type { ComputeProfile, GpuVendor } from "../hardware/types.js";
import { GpuUnavailableError } from "../orchestrator/errors.js";
import { DevDirectoryEnumerator, type DeviceEnumerator } from "./device-enumerator.js";

export type HardwareMode = "real" | "mock";

export interface DeviceMapping {
  hostPath: string;
  containerPath: string;
}

export interface DeviceOverrides {
  /** MOCK_HARDWARE directive; only an explicit `true` skips enumeration. */
  mockHardware?: boolean;
  /** Device path for the primary serial device. */
  serialDevice?: string;
  /** true = GPU explicitly requested, false = explicitly refused, undefined = follow the descriptor. */
  gpu?: boolean;
}

export interface GpuPlan {
  requested: boolean;
  /** The user asked for the GPU; a passthrough failure must surface instead of downgrading. */
  explicit: boolean;
  vendor: GpuVendor;
  /** Host device nodes the vendor's passthrough needs (AMD: /dev/kfd, /dev/dri). */
  devicePaths: string[];
}

export interface DevicePlan {
  /** Physical (serial/video) mappings. Always empty in mock mode. */
  deviceMappings: DeviceMapping[];
  hardwareMode: HardwareMode;
  primarySerial: string | null;
  gpu: GpuPlan;
}

const PHYSICAL: readonly DeviceClass[] = ["serial", "video"];
const AMD_GPU_DEVICES = ["/dev/kfd", "/dev/dri"];

/**
 * Decides which host devices a backend gets and whether it runs against real
 * or simulated hardware. Missing or unreadable devices are a mode decision
 * (mock), never an error; only an explicit GPU request can fail.
 */
export class DevicePassthroughPolicy {
  private readonly enumerator: DeviceEnumerator;

  constructor(enumerator?: DeviceEnumerator) {
    this.enumerator = enumerator ?? new DevDirectoryEnumerator();
  }

  async planDevices(
    requiredDevices: readonly DeviceClass[],
    profile: ComputeProfile,
    overrides: DeviceOverrides = {},
  ): Promise<DevicePlan> {
    const gpu = this.planGpu(requiredDevices, profile, overrides);
    const physical = PHYSICAL.filter((c) => requiredDevices.includes(c));

    if (physical.length === 0) {
      return { deviceMappings: [], hardwareMode: "real", primarySerial: null, gpu };
    }

    if (overrides.mockHardware === true) {
      logger.info("MOCK_HARDWARE is set; using simulated hardware");
      return mockPlan(gpu);
    }

    let serial: string[] = [];
    let video: string[] = [];
    try {
      if (physical.includes("serial")) serial = await this.serialCandidates(overrides.serialDevice);
      if (physical.includes("video")) video = await this.enumerator.videoDevices();
    } catch (err) {
      logger.warn("Device enumeration failed; falling back to mock hardware", { err });
      return mockPlan(gpu);
    }

    const missing = physical.filter((c) => (c === "serial" ? serial : video).length === 0);
    if (missing.length > 0) {
      logger.info(`No ${missing.join("/")} device found; using mock hardware`);
      return mockPlan(gpu);
    }

    const deviceMappings = [...serial, ...video].map((p) => ({ hostPath: p, containerPath: p }));
    return {
      deviceMappings,
      hardwareMode: "real",
      primarySerial: serial[0] ?? null,
      gpu,
    };
  }

  /** The override path alone when given (and present), otherwise every enumerated serial port. */
  private async serialCandidates(override: string | undefined): Promise<string[]> {
    if (!override) return this.enumerator.serialPorts();
    if (await this.enumerator.exists(override)) return [override];
    logger.warn(`Serial device ${override} does not exist`);
    return [];
  }

  private planGpu(requiredDevices: readonly DeviceClass[], profile: ComputeProfile, overrides: DeviceOverrides): GpuPlan {
    const explicit = overrides.gpu === true;
    const wanted = overrides.gpu ?? requiredDevices.includes("gpu");
    const none: GpuPlan = { requested: false, explicit, vendor: profile.gpuVendor, devicePaths: [] };

    if (!wanted) return none;

    const usable = profile.gpuVendor !== "none" && profile.computeBackend !== "CPU";
    if (!usable) {
      if (explicit) {
        throw new GpuUnavailableError(
          profile.gpuVendor === "none"
            ? "no GPU was detected"
            : `${profile.gpuVendor} GPU found but no usable compute toolkit`,
        );
      }
      logger.debug("GPU not available; continuing on CPU");
      return none;
    }

    return {
      requested: true,
      explicit,
      vendor: profile.gpuVendor,
      devicePaths: profile.gpuVendor === "amd" ? [...AMD_GPU_DEVICES] : [],
    };
  }
}

function mockPlan(gpu: GpuPlan): DevicePlan {
  return { deviceMappings: [], hardwareMode: "mock", primarySerial: null, gpu };
}
