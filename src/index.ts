export { BackendCatalog, imageFor, loadBackendCatalog, parseBackendDefinition } from "./catalog/backend-catalog.js";
export type { DeviceClass, ServerDescriptor } from "./catalog/backend-schema.js";
export { BackendClient, type Observation, type PredictResponse } from "./client/backend-client.js";
export { type Config, loadConfig } from "./config/index.js";
export { logger, setLogLevel } from "./config/logger.js";
export { DevDirectoryEnumerator, type DeviceEnumerator } from "./devices/device-enumerator.js";
export { type DevicePlan, DevicePassthroughPolicy } from "./devices/device-policy.js";
export { HardwareProfiler } from "./hardware/hardware-profiler.js";
export { formatProfile, recommendBackend } from "./hardware/recommend.js";
export type { ComputeBackend, ComputeProfile, GpuVendor } from "./hardware/types.js";
export { listCachedModels } from "./models/model-cache.js";
export {
  ConfigResolver,
  FALLBACK_MODEL,
  FALLBACK_PORT,
  type ResolveOverrides,
  type ResolveResult,
} from "./orchestrator/config-resolver.js";
export * from "./orchestrator/errors.js";
export { HealthMonitor, type HealthOutcome } from "./orchestrator/health-monitor.js";
export { InstanceRegistry } from "./orchestrator/instance-registry.js";
export { type InstanceState, InvalidTransitionError, isValidTransition } from "./orchestrator/instance-state-machine.js";
export { LifecycleManager } from "./orchestrator/lifecycle-manager.js";
export { NetPortProbe, type PortProbe } from "./orchestrator/port-probe.js";
export { Session, type SessionDeps } from "./orchestrator/session.js";
export type { LaunchPlan, RunningInstanceRecord } from "./orchestrator/types.js";
export { type ContainerRuntime, ImagePullError } from "./runtime/container-runtime.js";
export { DockerRuntime } from "./runtime/docker-runtime.js";
export { type SessionRecord, StateStore } from "./state/state-store.js";
