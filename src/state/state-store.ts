import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { computeProfileSchema } from "../hardware/types.js";

/** What the last successful serve left behind, so later commands know the active setup. */
export const sessionRecordSchema = z.object({
  hardwareProfile: computeProfileSchema,
  backend: z.string().min(1),
  model: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  /** ISO-8601 */
  lastUsedAt: z.string(),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export const STATE_FILE = "state.yaml";

/**
 * Persists the session record as YAML under the aiserve home directory.
 * Writes go to a temp file first and are renamed into place.
 */
export class StateStore {
  private readonly filePath: string;

  constructor(private readonly homeDir: string) {
    this.filePath = join(homeDir, STATE_FILE);
  }

  get path(): string {
    return this.filePath;
  }

  /** The stored record, or null when there is none or it is unreadable. */
  async read(): Promise<SessionRecord | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = yaml.load(content, { schema: yaml.JSON_SCHEMA });
    } catch (err) {
      logger.warn(`Ignoring unreadable state file ${this.filePath}`, { err });
      return null;
    }
    const parsed = sessionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring invalid state file ${this.filePath}`, { issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async write(record: SessionRecord): Promise<void> {
    const valid = sessionRecordSchema.parse(record);
    await mkdir(this.homeDir, { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmp, yaml.dump(valid, { sortKeys: true }), "utf-8");
    await rename(tmp, this.filePath);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
