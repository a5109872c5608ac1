import { z } from "zod";

export const GPU_VENDORS = ["none", "nvidia", "amd", "apple"] as const;
export const gpuVendorSchema = z.enum(GPU_VENDORS);
export type GpuVendor = z.infer<typeof gpuVendorSchema>;

export const COMPUTE_BACKENDS = ["CUDA", "ROCm", "Metal", "CPU"] as const;
export const computeBackendSchema = z.enum(COMPUTE_BACKENDS);
export type ComputeBackend = z.infer<typeof computeBackendSchema>;

/** Detected capability classification of the host. Also persisted in the session record. */
export const computeProfileSchema = z.object({
  os: z.string().min(1),
  osRelease: z.string(),
  arch: z.string(),
  cpuModel: z.string(),
  cpuCores: z.number().int().positive(),
  memoryGb: z.number().nonnegative(),
  gpuVendor: gpuVendorSchema,
  gpuModel: z.string().nullable(),
  gpuMemoryMb: z.number().nonnegative(),
  computeBackend: computeBackendSchema,
});

export type ComputeProfile = Readonly<z.infer<typeof computeProfileSchema>>;
