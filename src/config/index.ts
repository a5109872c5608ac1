import { homedir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/**
 * Parse a boolean-like environment directive ("true", "1", "yes", "on").
 * Returns undefined when the variable is unset so callers can tell
 * "explicitly false" apart from "not given".
 */
export function parseBooleanDirective(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = raw.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  throw new Error(`Invalid boolean directive "${raw}": expected true/false`);
}

/** Directory holding the shipped backend definitions (<root>/backends). */
export function defaultCatalogDir(): string {
  // At runtime this file lives in dist/config/ (or src/config/ under vitest).
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "..", "backends");
}

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("warn"),

  /** Per-user state directory; the session record lives here. */
  home: z.string().min(1).default(path.join(homedir(), ".aiserve")),

  /** Directory of backend definition YAML files. */
  catalogDir: z.string().min(1).default(defaultCatalogDir()),

  docker: z
    .object({
      socketPath: z.string().default("/var/run/docker.sock"),
      /** When to pull images before launch. */
      imagePull: z.enum(["always", "missing", "never"]).default("missing"),
    })
    .default({ socketPath: "/var/run/docker.sock", imagePull: "missing" }),

  timeouts: z
    .object({
      /** Health-check budget for a started instance. */
      healthMs: z.coerce.number().int().min(1000).default(30_000),
      /** Container launch budget, image pull included. */
      launchMs: z.coerce.number().int().min(1000).default(300_000),
      /** Seconds between SIGTERM and SIGKILL on stop. */
      stopGraceSeconds: z.coerce.number().int().min(0).max(600).default(10),
    })
    .default({ healthMs: 30_000, launchMs: 300_000, stopGraceSeconds: 10 }),

  /** Local Hugging Face hub cache, scanned by `list`. */
  hfCacheDir: z.string().min(1).default(path.join(homedir(), ".cache", "huggingface", "hub")),

  /** Process-wide MOCK_HARDWARE directive; undefined means "decide by device enumeration". */
  mockHardware: z.boolean().optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Build the configuration from an environment map (defaults to process.env). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env.LOG_LEVEL,
    home: env.AISERVE_HOME,
    catalogDir: env.AISERVE_CATALOG_DIR,
    docker: {
      socketPath: env.DOCKER_SOCKET,
      imagePull: env.AISERVE_IMAGE_PULL,
    },
    timeouts: {
      healthMs: env.AISERVE_HEALTH_TIMEOUT_MS,
      launchMs: env.AISERVE_LAUNCH_TIMEOUT_MS,
      stopGraceSeconds: env.AISERVE_STOP_GRACE_SECONDS,
    },
    hfCacheDir: env.AISERVE_HF_CACHE_DIR,
    mockHardware: parseBooleanDirective(env.MOCK_HARDWARE),
  });
}
