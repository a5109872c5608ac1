import { z } from "zod";

export const DEVICE_CLASSES = ["serial", "video", "gpu"] as const;
export const deviceClassSchema = z.enum(DEVICE_CLASSES);
export type DeviceClass = z.infer<typeof deviceClassSchema>;

/** Backend identifiers: lowercase alphanumerics, dots, hyphens, underscores. */
const backendIdRegex = /^[a-z0-9][a-z0-9._-]{0,62}$/;

/** Image per GPU vendor; `cpu` doubles as the fallback for every vendor. */
export const imageTableSchema = z
  .object({
    nvidia: z.string().min(1).optional(),
    amd: z.string().min(1).optional(),
    apple: z.string().min(1).optional(),
    cpu: z.string().min(1).optional(),
  })
  .strict();
export type ImageTable = z.infer<typeof imageTableSchema>;

/** Host path (or named volume) mounted into the container. A leading `~` expands to the user's home. */
export const volumeSchema = z.object({
  source: z.string().min(1),
  target: z.string().startsWith("/"),
  readonly: z.boolean().default(false),
});
export type VolumeSpec = z.infer<typeof volumeSchema>;

/** Schema for one backend definition file under backends/. */
export const serverDescriptorSchema = z.object({
  id: z.string().regex(backendIdRegex, "id must be lowercase alphanumerics, '.', '-' or '_'"),
  description: z.string().default(""),
  kind: z.enum(["chat", "robot"]),
  defaultModel: z.string().min(1).optional(),
  defaultPort: z.number().int().min(1).max(65535).optional(),
  /** Port the server listens on inside the container. */
  containerPort: z.number().int().min(1).max(65535),
  /** Placeholders: {backend}, {port}. */
  containerNameTemplate: z.string().min(1).default("aiserve-{backend}-{port}"),
  images: imageTableSchema,
  requiredDevices: z.array(deviceClassSchema).default([]),
  healthPath: z.string().startsWith("/").default("/health"),
  /** Extra variable that receives the resolved model, besides MODEL_ID. */
  modelEnv: z.string().optional(),
  /** Container command arguments. Placeholders: {model}, {port} (container port). */
  command: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  /** Host environment variables copied into the container when set (tokens and such). */
  passEnv: z.array(z.string()).default([]),
  volumes: z.array(volumeSchema).default([]),
  /** Overrides the configured health-check timeout for slow-loading backends. */
  startupTimeoutSeconds: z.number().int().positive().optional(),
});

export type ServerDescriptor = Readonly<z.infer<typeof serverDescriptorSchema>>;
