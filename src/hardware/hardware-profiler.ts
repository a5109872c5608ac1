import { execFile } from "node:child_process";
import os from "node:os";
import { promisify } from "node:util";
import { logger } from "../config/logger.js";
import { HardwareDetectionError } from "../orchestrator/errors.js";
import type { ComputeBackend, ComputeProfile, GpuVendor } from "./types.js";

const execFileAsync = promisify(execFile);

/** Runs a tool with an explicit argument array; rejects when the tool is missing or exits non-zero. */
export type CommandRunner = (file: string, args: readonly string[], timeoutMs: number) => Promise<string>;

/** Subset of node:os the profiler reads. */
export interface SystemInfo {
  type(): string;
  release(): string;
  arch(): string;
  platform(): NodeJS.Platform;
  cpus(): Array<{ model: string }>;
  totalmem(): number;
}

export interface HardwareProfilerOptions {
  run?: CommandRunner;
  system?: SystemInfo;
  /** Per-tool timeout. Default: 5000 */
  toolTimeoutMs?: number;
}

export interface GpuProbe {
  model: string;
  memoryMb: number;
}

const MIB = 1024 * 1024;

const defaultRunner: CommandRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, [...args], { timeout: timeoutMs, encoding: "utf-8" });
  return stdout;
};

/**
 * Inspects the local machine and classifies it into a ComputeProfile.
 *
 * GPU tools are queried with execFile (no shell). A missing tool only means
 * "no such GPU", never an error. The first successful detection is cached, so
 * one profiler instance yields one profile per session.
 */
export class HardwareProfiler {
  private readonly run: CommandRunner;
  private readonly system: SystemInfo;
  private readonly toolTimeoutMs: number;
  private cached: Promise<ComputeProfile> | null = null;

  constructor(options: HardwareProfilerOptions = {}) {
    this.run = options.run ?? defaultRunner;
    this.system = options.system ?? os;
    this.toolTimeoutMs = options.toolTimeoutMs ?? 5_000;
  }

  detect(): Promise<ComputeProfile> {
    if (!this.cached) {
      this.cached = this.detectUncached();
      // A failed detection is not cached so the caller may retry.
      this.cached.catch(() => {
        this.cached = null;
      });
    }
    return this.cached;
  }

  private async detectUncached(): Promise<ComputeProfile> {
    const osName = this.readOsName();
    const cpus = this.readCpus();
    const cpuModel = cpus[0]?.model.trim() || "Unknown CPU";
    const memoryGb = Math.round((this.system.totalmem() / 1024 ** 3) * 100) / 100;

    const gpu = await this.classifyGpu(cpuModel);

    const profile: ComputeProfile = Object.freeze({
      os: osName,
      osRelease: this.system.release(),
      arch: this.system.arch(),
      cpuModel,
      cpuCores: cpus.length,
      memoryGb,
      gpuVendor: gpu.vendor,
      gpuModel: gpu.model,
      gpuMemoryMb: gpu.memoryMb,
      computeBackend: gpu.backend,
    });

    logger.debug("Hardware profile detected", { profile });
    return profile;
  }

  private readOsName(): string {
    let name: string;
    try {
      name = this.system.type();
    } catch (err) {
      throw new HardwareDetectionError("os", err);
    }
    if (!name) throw new HardwareDetectionError("os");
    return name;
  }

  private readCpus(): Array<{ model: string }> {
    let cpus: Array<{ model: string }>;
    try {
      cpus = this.system.cpus();
    } catch (err) {
      throw new HardwareDetectionError("cpu_cores", err);
    }
    if (cpus.length === 0) throw new HardwareDetectionError("cpu_cores");
    return cpus;
  }

  /**
   * Vendor precedence: NVIDIA with driver and container toolkit (CUDA), then
   * AMD (ROCm), then Apple silicon (Metal), then CPU. An NVIDIA card without a
   * toolkit keeps its vendor but computes on the CPU.
   */
  private async classifyGpu(
    cpuModel: string,
  ): Promise<{ vendor: GpuVendor; model: string | null; memoryMb: number; backend: ComputeBackend }> {
    const nvidia = await this.queryNvidia();
    if (nvidia && (await this.hasNvidiaToolkit())) {
      return { vendor: "nvidia", model: nvidia.model, memoryMb: nvidia.memoryMb, backend: "CUDA" };
    }

    const amd = await this.queryAmd();
    if (amd) {
      return { vendor: "amd", model: amd.model, memoryMb: amd.memoryMb, backend: "ROCm" };
    }

    if (this.system.platform() === "darwin" && this.system.arch() === "arm64") {
      // Unified memory: the GPU shares system RAM.
      return {
        vendor: "apple",
        model: cpuModel,
        memoryMb: Math.round(this.system.totalmem() / MIB),
        backend: "Metal",
      };
    }

    if (nvidia) {
      logger.warn("NVIDIA GPU found but no CUDA/container toolkit; using CPU compute", { gpu: nvidia.model });
      return { vendor: "nvidia", model: nvidia.model, memoryMb: nvidia.memoryMb, backend: "CPU" };
    }

    return { vendor: "none", model: null, memoryMb: 0, backend: "CPU" };
  }

  private async queryNvidia(): Promise<GpuProbe | null> {
    const out = await this.tryRun("nvidia-smi", ["--query-gpu=name,memory.total", "--format=csv,noheader,nounits"]);
    if (!out) return null;
    return parseNvidiaSmi(out);
  }

  private async hasNvidiaToolkit(): Promise<boolean> {
    for (const tool of ["nvidia-container-cli", "nvidia-ctk", "nvcc"]) {
      if ((await this.tryRun(tool, ["--version"])) !== null) return true;
    }
    return false;
  }

  private async queryAmd(): Promise<GpuProbe | null> {
    const out = await this.tryRun("rocm-smi", ["--showproductname", "--showmeminfo", "vram", "--json"]);
    if (!out) return null;
    return parseRocmSmi(out);
  }

  private async tryRun(file: string, args: readonly string[]): Promise<string | null> {
    try {
      return await this.run(file, args, this.toolTimeoutMs);
    } catch (err) {
      logger.debug(`${file} unavailable`, { err });
      return null;
    }
  }
}

/** Parse `nvidia-smi --query-gpu=name,memory.total --format=csv,noheader,nounits`; first GPU wins. */
export function parseNvidiaSmi(output: string): GpuProbe | null {
  const line = output
    .split("\n")
    .map((l) => l.trim())
    .find(Boolean);
  if (!line) return null;

  const [name, memory] = line.split(",").map((s) => s.trim());
  if (!name) return null;
  const memoryMb = Number.parseInt(memory ?? "", 10);
  return { model: name, memoryMb: Number.isNaN(memoryMb) ? 0 : memoryMb };
}

/** Parse `rocm-smi --showproductname --showmeminfo vram --json`; first card wins. */
export function parseRocmSmi(output: string): GpuProbe | null {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    return null;
  }
  if (typeof raw !== "object" || raw === null) return null;

  const cardKey = Object.keys(raw)
    .filter((k) => k.startsWith("card"))
    .sort()[0];
  if (!cardKey) return null;
  const card: unknown = Reflect.get(raw, cardKey);
  if (typeof card !== "object" || card === null) return null;

  let model: string | null = null;
  let memoryMb = 0;
  for (const [key, value] of Object.entries(card)) {
    if (typeof value !== "string") continue;
    if (!model && /card series|card model|product name/i.test(key)) model = value.trim();
    if (/vram total memory/i.test(key)) {
      const bytes = Number.parseInt(value, 10);
      if (!Number.isNaN(bytes)) memoryMb = Math.round(bytes / MIB);
    }
  }
  return { model: model ?? "AMD GPU", memoryMb };
}
