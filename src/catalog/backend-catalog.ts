import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { GpuVendor } from "../hardware/types.js";
import { CatalogLoadError, ImageNotFoundError, UnknownBackendError } from "../orchestrator/errors.js";
import { type ServerDescriptor, serverDescriptorSchema } from "./backend-schema.js";

/** Load and validate a single backend definition. */
export function parseBackendDefinition(content: string, filename: string): ServerDescriptor {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new CatalogLoadError(`Invalid backend definition "${filename}": not valid YAML`, err);
  }
  const result = serverDescriptorSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogLoadError(`Invalid backend definition "${filename}": ${result.error.message}`);
  }
  return result.data;
}

/**
 * Read-only registry of backend descriptors keyed by identifier.
 *
 * Descriptors are frozen at construction. Adding a backend means adding a
 * definition file (or passing one more descriptor here), never mutating a
 * live catalog.
 */
export class BackendCatalog {
  private readonly descriptors: ReadonlyMap<string, ServerDescriptor>;

  constructor(descriptors: readonly ServerDescriptor[]) {
    const map = new Map<string, ServerDescriptor>();
    for (const descriptor of descriptors) {
      if (map.has(descriptor.id)) {
        throw new CatalogLoadError(`Duplicate backend id: ${descriptor.id}`);
      }
      map.set(descriptor.id, deepFreeze({ ...descriptor }));
    }
    this.descriptors = map;
  }

  get(backendId: string): ServerDescriptor {
    const descriptor = this.descriptors.get(backendId);
    if (!descriptor) throw new UnknownBackendError(backendId, this.ids());
    return descriptor;
  }

  has(backendId: string): boolean {
    return this.descriptors.has(backendId);
  }

  ids(): string[] {
    return [...this.descriptors.keys()].sort();
  }

  list(): ServerDescriptor[] {
    return this.ids().map((id) => this.get(id));
  }
}

/** Image for a GPU vendor, falling back to the `cpu` entry. `none` always takes the `cpu` entry. */
export function imageFor(descriptor: ServerDescriptor, vendor: GpuVendor): string {
  const specific = vendor === "none" ? undefined : descriptor.images[vendor];
  const image = specific ?? descriptor.images.cpu;
  if (!image) throw new ImageNotFoundError(descriptor.id, vendor);
  return image;
}

/** Build the catalog from every *.yaml / *.yml file in a directory. */
export function loadBackendCatalog(catalogDir: string): BackendCatalog {
  if (!fs.existsSync(catalogDir)) {
    throw new CatalogLoadError(`Backend catalog directory not found: ${catalogDir}`);
  }

  const files = fs
    .readdirSync(catalogDir)
    .filter((f) => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();

  const descriptors = files.map((file) =>
    parseBackendDefinition(fs.readFileSync(path.join(catalogDir, file), "utf-8"), file),
  );
  return new BackendCatalog(descriptors);
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Reflect.ownKeys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
