import { describe, expect, it, vi } from "vitest";
import { BackendCatalog } from "../catalog/backend-catalog.js";
import { serverDescriptorSchema } from "../catalog/backend-schema.js";
import type { DeviceEnumerator } from "../devices/device-enumerator.js";
import { DevicePassthroughPolicy } from "../devices/device-policy.js";
import { CPU_PROFILE, makeRecord, NVIDIA_PROFILE } from "../test/fixtures.js";
import { ConfigResolver, FALLBACK_MODEL, FALLBACK_PORT } from "./config-resolver.js";
import { GpuUnavailableError, PortConflictError, UnknownBackendError } from "./errors.js";
import type { PortProbe } from "./port-probe.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const catalog = new BackendCatalog([
  serverDescriptorSchema.parse({
    id: "chat",
    kind: "chat",
    defaultModel: "test/chat-model",
    defaultPort: 8000,
    containerPort: 8000,
    images: { nvidia: "example/chat:cuda", amd: "example/chat:rocm", cpu: "example/chat:cpu" },
    requiredDevices: ["gpu"],
    command: ["--model", "{model}", "--port", "{port}"],
    passEnv: ["HF_TOKEN"],
    env: { EXTRA: "1" },
    volumes: [{ source: "~/.cache/huggingface", target: "/root/.cache/huggingface" }],
    startupTimeoutSeconds: 600,
  }),
  serverDescriptorSchema.parse({
    id: "robot",
    kind: "robot",
    defaultModel: "test/policy",
    defaultPort: 5070,
    containerPort: 5070,
    images: { nvidia: "example/robot:cuda", cpu: "example/robot:cpu" },
    requiredDevices: ["serial", "video", "gpu"],
    modelEnv: "POLICY_MODEL",
  }),
  serverDescriptorSchema.parse({
    id: "bare",
    kind: "chat",
    containerPort: 80,
    images: { cpu: "example/bare:cpu" },
  }),
]);

const freePorts: PortProbe = { isFree: async () => true };

function devices(serial: string[] = [], video: string[] = []): DeviceEnumerator {
  return {
    serialPorts: async () => serial,
    videoDevices: async () => video,
    exists: async () => false,
  };
}

function resolver(options: { enumerator?: DeviceEnumerator; portProbe?: PortProbe } = {}) {
  return new ConfigResolver(catalog, new DevicePassthroughPolicy(options.enumerator ?? devices()), {
    healthTimeoutMs: 30_000,
    portProbe: options.portProbe ?? freePorts,
  });
}

describe("ConfigResolver", () => {
  it("fills defaults from the backend definition", async () => {
    const result = await resolver().resolve("chat", CPU_PROFILE, {}, []);
    expect(result.kind).toBe("plan");
    expect(result.plan).toMatchObject({
      backendId: "chat",
      resolvedModel: "test/chat-model",
      resolvedPort: 8000,
      containerPort: 8000,
      containerName: "aiserve-chat-8000",
      imageRef: "example/chat:cpu",
      gpuRequested: false,
      hardwareMode: "real",
      command: ["--model", "test/chat-model", "--port", "8000"],
      env: { EXTRA: "1", MODEL_ID: "test/chat-model" },
      passEnv: ["HF_TOKEN"],
      healthPath: "/health",
      healthTimeoutMs: 600_000,
    });
    expect(result.plan.fallbackImageRef).toBeUndefined();
  });

  it("lets overrides win and keeps the container port in the command", async () => {
    const { plan } = await resolver().resolve("chat", CPU_PROFILE, { model: "other/model", port: 9100 }, []);
    expect(plan.resolvedModel).toBe("other/model");
    expect(plan.resolvedPort).toBe(9100);
    expect(plan.containerName).toBe("aiserve-chat-9100");
    expect(plan.command).toEqual(["--model", "other/model", "--port", "8000"]);
  });

  it("falls back to the process-wide model and port", async () => {
    const { plan } = await resolver().resolve("bare", CPU_PROFILE, {}, []);
    expect(plan.resolvedModel).toBe(FALLBACK_MODEL);
    expect(plan.resolvedPort).toBe(FALLBACK_PORT);
    expect(plan.healthTimeoutMs).toBe(30_000);
  });

  it("selects the vendor image and a CPU fallback for an implicit GPU request", async () => {
    const { plan } = await resolver().resolve("chat", NVIDIA_PROFILE, {}, []);
    expect(plan.imageRef).toBe("example/chat:cuda");
    expect(plan.gpuRequested).toBe(true);
    expect(plan.gpuExplicit).toBe(false);
    expect(plan.fallbackImageRef).toBe("example/chat:cpu");
  });

  it("offers no fallback for an explicit GPU request", async () => {
    const { plan } = await resolver().resolve("chat", NVIDIA_PROFILE, { gpu: true }, []);
    expect(plan.gpuExplicit).toBe(true);
    expect(plan.fallbackImageRef).toBeUndefined();
  });

  it("uses the CPU image with --no-gpu", async () => {
    const { plan } = await resolver().resolve("chat", NVIDIA_PROFILE, { gpu: false }, []);
    expect(plan.imageRef).toBe("example/chat:cpu");
    expect(plan.gpuRequested).toBe(false);
  });

  it("propagates GpuUnavailableError for --gpu on a CPU host", async () => {
    await expect(resolver().resolve("chat", CPU_PROFILE, { gpu: true }, [])).rejects.toBeInstanceOf(
      GpuUnavailableError,
    );
  });

  it("throws UnknownBackendError for an unregistered id", async () => {
    await expect(resolver().resolve("nope", CPU_PROFILE, {}, [])).rejects.toBeInstanceOf(UnknownBackendError);
  });

  describe("robot hardware", () => {
    it("plans mock hardware when no devices are attached", async () => {
      const { plan } = await resolver().resolve("robot", CPU_PROFILE, {}, []);
      expect(plan.hardwareMode).toBe("mock");
      expect(plan.deviceMappings).toEqual([]);
      expect(plan.env).toEqual({ MODEL_ID: "test/policy", POLICY_MODEL: "test/policy", MOCK_HARDWARE: "true" });
    });

    it("passes the primary serial device when hardware is attached", async () => {
      const enumerator = devices(["/dev/ttyUSB0"], ["/dev/video0"]);
      const { plan } = await resolver({ enumerator }).resolve("robot", CPU_PROFILE, {}, []);
      expect(plan.hardwareMode).toBe("real");
      expect(plan.env.MOCK_HARDWARE).toBe("false");
      expect(plan.env.ROBOT_PORT).toBe("/dev/ttyUSB0");
      expect(plan.deviceMappings.map((d) => d.hostPath)).toEqual(["/dev/ttyUSB0", "/dev/video0"]);
    });

    it("honours the mock override even with devices present", async () => {
      const enumerator = devices(["/dev/ttyUSB0"], ["/dev/video0"]);
      const { plan } = await resolver({ enumerator }).resolve("robot", CPU_PROFILE, { mockHardware: true }, []);
      expect(plan.hardwareMode).toBe("mock");
      expect(plan.env.ROBOT_PORT).toBeUndefined();
    });
  });

  describe("ports", () => {
    it("rejects a port held by another backend", async () => {
      const snapshot = [makeRecord({ backendId: "chat", port: 5070 })];
      await expect(resolver().resolve("robot", CPU_PROFILE, {}, snapshot)).rejects.toMatchObject({
        port: 5070,
        holder: "chat",
      });
    });

    it("returns the running instance's plan unchanged", async () => {
      const record = makeRecord({ backendId: "chat", port: 8000 });
      const result = await resolver().resolve("chat", CPU_PROFILE, {}, [record]);
      expect(result.kind).toBe("existing");
      expect(result.plan).toBe(record.plan);
    });

    it("rejects a port held by a foreign process", async () => {
      const portProbe: PortProbe = { isFree: vi.fn(async () => false) };
      const err = await resolver({ portProbe })
        .resolve("chat", CPU_PROFILE, {}, [])
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(PortConflictError);
      expect(err).toMatchObject({ port: 8000, holder: null });
    });

    it("does not probe a port its own backend already holds", async () => {
      const isFree = vi.fn(async () => false);
      const record = makeRecord({ backendId: "chat", port: 8000, healthState: "unhealthy" });
      const result = await resolver({ portProbe: { isFree } }).resolve("chat", CPU_PROFILE, {}, [record]);
      expect(result.kind).toBe("plan");
      expect(isFree).not.toHaveBeenCalled();
    });
  });
});
