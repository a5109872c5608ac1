import type { ComputeProfile } from "../hardware/types.js";
import type { LaunchPlan, RunningInstanceRecord } from "../orchestrator/types.js";

export const CPU_PROFILE: ComputeProfile = Object.freeze({
  os: "Linux",
  osRelease: "6.8.0",
  arch: "x64",
  cpuModel: "Test CPU",
  cpuCores: 4,
  memoryGb: 8,
  gpuVendor: "none",
  gpuModel: null,
  gpuMemoryMb: 0,
  computeBackend: "CPU",
});

export const NVIDIA_PROFILE: ComputeProfile = Object.freeze({
  ...CPU_PROFILE,
  memoryGb: 32,
  gpuVendor: "nvidia",
  gpuModel: "RTX 4090",
  gpuMemoryMb: 24564,
  computeBackend: "CUDA",
});

export function makePlan(overrides: Partial<LaunchPlan> = {}): LaunchPlan {
  const backendId = overrides.backendId ?? "echo";
  const port = overrides.resolvedPort ?? 9000;
  return {
    backendId,
    resolvedModel: "test/model",
    resolvedPort: port,
    containerPort: 9000,
    containerName: `aiserve-${backendId}-${port}`,
    imageRef: "example/echo:cpu",
    deviceMappings: [],
    env: { MODEL_ID: "test/model" },
    passEnv: [],
    gpuRequested: false,
    gpuExplicit: false,
    gpuVendor: "none",
    gpuDevicePaths: [],
    hardwareMode: "real",
    command: [],
    volumes: [],
    healthPath: "/health",
    healthTimeoutMs: 1000,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<RunningInstanceRecord> = {}): RunningInstanceRecord {
  const backendId = overrides.backendId ?? "echo";
  const port = overrides.port ?? 9000;
  return {
    backendId,
    model: "test/model",
    containerId: `${backendId}-${port}`,
    containerName: `aiserve-${backendId}-${port}`,
    port,
    imageRef: "example/echo:cpu",
    hardwareMode: "real",
    startedAt: "2026-01-01T00:00:00.000Z",
    healthState: "running",
    plan: makePlan({ backendId, resolvedPort: port }),
    ...overrides,
  };
}
