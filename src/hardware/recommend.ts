import type { ComputeProfile } from "./types.js";

/**
 * Suggest a backend for the host. vLLM wants a discrete GPU with at least
 * 8 GB of VRAM and 16 GB of RAM; Ollama is happy with 6 GB of VRAM or 16 GB of
 * RAM; anything smaller gets llama.cpp.
 */
export function recommendBackend(profile: ComputeProfile): "vllm" | "ollama" | "llama-cpp" {
  const discrete = profile.gpuVendor === "nvidia" || profile.gpuVendor === "amd";
  const vramGb = profile.gpuMemoryMb / 1024;

  if (discrete && vramGb >= 8 && profile.memoryGb >= 16) return "vllm";
  if ((discrete && vramGb >= 6) || profile.memoryGb >= 16) return "ollama";
  return "llama-cpp";
}

/** Human-readable multi-line rendering used by `aiserve profile`. */
export function formatProfile(profile: ComputeProfile): string {
  const gpu =
    profile.gpuVendor === "none"
      ? "none"
      : `${profile.gpuModel ?? profile.gpuVendor} (${profile.gpuVendor}, ${profile.gpuMemoryMb} MB)`;
  return [
    `Operating system: ${profile.os} ${profile.osRelease} (${profile.arch})`,
    `CPU:              ${profile.cpuModel}`,
    `CPU cores:        ${profile.cpuCores}`,
    `Memory:           ${profile.memoryGb} GB`,
    `GPU:              ${gpu}`,
    `Compute backend:  ${profile.computeBackend}`,
  ].join("\n");
}
