import { z } from "zod";
import { volumeSchema } from "../catalog/backend-schema.js";
import { gpuVendorSchema } from "../hardware/types.js";
import type { InstanceState } from "./instance-state-machine.js";

export const hardwareModeSchema = z.enum(["real", "mock"]);

export const deviceMappingSchema = z.object({
  hostPath: z.string().min(1),
  containerPath: z.string().min(1),
});

/**
 * Everything needed to start one backend instance. Built fresh per serve and
 * never mutated afterwards; a running record keeps the plan that started it.
 *
 * `env` holds only values the resolver computed. Host variables named in
 * `passEnv` (tokens) are read at launch time so they never land in the plan.
 */
export const launchPlanSchema = z.object({
  backendId: z.string().min(1),
  resolvedModel: z.string().min(1),
  resolvedPort: z.number().int().min(1).max(65535),
  containerPort: z.number().int().min(1).max(65535),
  containerName: z.string().min(1),
  imageRef: z.string().min(1),
  /** CPU image retried when an implicit GPU launch fails. */
  fallbackImageRef: z.string().min(1).optional(),
  deviceMappings: z.array(deviceMappingSchema),
  env: z.record(z.string(), z.string()),
  passEnv: z.array(z.string()),
  gpuRequested: z.boolean(),
  gpuExplicit: z.boolean(),
  gpuVendor: gpuVendorSchema,
  /** Extra GPU device nodes (AMD: /dev/kfd, /dev/dri). */
  gpuDevicePaths: z.array(z.string()),
  hardwareMode: hardwareModeSchema,
  command: z.array(z.string()),
  volumes: z.array(volumeSchema),
  healthPath: z.string().startsWith("/"),
  healthTimeoutMs: z.number().int().positive(),
});

export type LaunchPlan = Readonly<z.infer<typeof launchPlanSchema>>;

export interface RunningInstanceRecord {
  readonly backendId: string;
  readonly model: string;
  readonly containerId: string;
  readonly containerName: string;
  readonly port: number;
  readonly imageRef: string;
  readonly hardwareMode: "real" | "mock";
  /** ISO-8601 timestamp. */
  readonly startedAt: string;
  readonly healthState: InstanceState;
  /** Null for instances adopted from containers whose plan label was unreadable. */
  readonly plan: LaunchPlan | null;
}

export function instanceKey(backendId: string, port: number): string {
  return `${backendId}:${port}`;
}
