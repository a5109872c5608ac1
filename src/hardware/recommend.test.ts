import { describe, expect, it } from "vitest";
import { formatProfile, recommendBackend } from "./recommend.js";
import type { ComputeProfile } from "./types.js";

function profile(overrides: Partial<ComputeProfile> = {}): ComputeProfile {
  return {
    os: "Linux",
    osRelease: "6.8.0",
    arch: "x64",
    cpuModel: "Test CPU",
    cpuCores: 8,
    memoryGb: 8,
    gpuVendor: "none",
    gpuModel: null,
    gpuMemoryMb: 0,
    computeBackend: "CPU",
    ...overrides,
  };
}

describe("recommendBackend", () => {
  it("suggests vllm for a large discrete GPU with enough RAM", () => {
    expect(
      recommendBackend(profile({ gpuVendor: "nvidia", gpuMemoryMb: 24_000, memoryGb: 32, computeBackend: "CUDA" })),
    ).toBe("vllm");
  });

  it("suggests ollama for a mid-size GPU", () => {
    expect(recommendBackend(profile({ gpuVendor: "amd", gpuMemoryMb: 6144, memoryGb: 8 }))).toBe("ollama");
  });

  it("suggests ollama for a CPU machine with 16 GB of RAM", () => {
    expect(recommendBackend(profile({ memoryGb: 16 }))).toBe("ollama");
  });

  it("suggests llama-cpp for small machines", () => {
    expect(recommendBackend(profile())).toBe("llama-cpp");
    expect(recommendBackend(profile({ gpuVendor: "apple", gpuMemoryMb: 8192, computeBackend: "Metal" }))).toBe(
      "llama-cpp",
    );
  });
});

describe("formatProfile", () => {
  it("renders a CPU-only machine", () => {
    expect(formatProfile(profile())).toBe(
      [
        "Operating system: Linux 6.8.0 (x64)",
        "CPU:              Test CPU",
        "CPU cores:        8",
        "Memory:           8 GB",
        "GPU:              none",
        "Compute backend:  CPU",
      ].join("\n"),
    );
  });

  it("renders the GPU model, vendor and memory", () => {
    const text = formatProfile(
      profile({ gpuVendor: "nvidia", gpuModel: "RTX 4090", gpuMemoryMb: 24564, computeBackend: "CUDA" }),
    );
    expect(text.split("\n")[4]).toBe("GPU:              RTX 4090 (nvidia, 24564 MB)");
  });
});
