import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

export interface CachedModel {
  /** Hub id, e.g. "org/name". */
  id: string;
  path: string;
}

const MODEL_DIR_RE = /^models--(.+)$/;

/**
 * Lists models in a local Hugging Face hub cache. The hub stores each repo
 * as `models--{org}--{name}`; anything else in the directory is ignored.
 */
export async function listCachedModels(hubDir: string): Promise<CachedModel[]> {
  let entries: string[];
  try {
    entries = await readdir(hubDir);
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const models: CachedModel[] = [];
  for (const entry of entries) {
    const match = MODEL_DIR_RE.exec(entry);
    if (!match) continue;
    const path = join(hubDir, entry);
    if (!(await stat(path)).isDirectory()) continue;
    models.push({ id: match[1].split("--").join("/"), path });
  }
  return models.sort((a, b) => a.id.localeCompare(b.id));
}
