import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { HardwareProfiler } from "../hardware/hardware-profiler.js";
import type { ComputeProfile } from "../hardware/types.js";
import type { SessionDeps } from "../orchestrator/session.js";
import { FakeRuntime } from "../test/fake-runtime.js";
import { CPU_PROFILE } from "../test/fixtures.js";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from "./run.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
  setLogLevel: vi.fn(),
}));

class FixedProfiler extends HardwareProfiler {
  override detect(): Promise<ComputeProfile> {
    return Promise.resolve(CPU_PROFILE);
  }
}

beforeAll(() => {
  chalk.level = 0;
});

describe("runCli", () => {
  let home: string;
  let runtime: FakeRuntime;
  let deps: SessionDeps;
  let out: string[];
  let err: string[];
  const fetchMock = vi.fn();

  function run(...argv: string[]): Promise<number> {
    return runCli(argv, {
      env: { AISERVE_HOME: home, AISERVE_HF_CACHE_DIR: join(home, "hub") },
      io: { out: (text) => out.push(text), err: (text) => err.push(text) },
      deps,
    });
  }

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "aiserve-cli-"));
    runtime = new FakeRuntime();
    deps = {
      runtime,
      profiler: new FixedProfiler(),
      portProbe: { isFree: async () => true },
      enumerator: { serialPorts: async () => [], videoDevices: async () => [], exists: async () => false },
      monitor: { initialIntervalMs: 5, maxIntervalMs: 10 },
      hostEnv: {},
    };
    out = [];
    err = [];
    fetchMock.mockReset();
    fetchMock.mockImplementation(async (url: string) =>
      url.endsWith("/predict")
        ? new Response(JSON.stringify({ action: [0.1, 0.2, 0.3], timestamp: 1767225600, info: { mock_mode: true } }))
        : new Response("ok"),
    );
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(home, { recursive: true, force: true });
  });

  describe("usage", () => {
    it("prints help with no command", async () => {
      await expect(run()).resolves.toBe(EXIT_OK);
      expect(out[0].split("\n")[0]).toBe("aiserve - launch and supervise AI-serving backends matched to this machine");
    });

    it("prints help for --help alongside a command", async () => {
      await expect(run("serve", "--help")).resolves.toBe(EXIT_OK);
      expect(runtime.launches).toHaveLength(0);
    });

    it("rejects unknown options", async () => {
      await expect(run("serve", "--bogus")).resolves.toBe(EXIT_USAGE);
      expect(err[1]).toBe("Run `aiserve --help` for usage.");
    });

    it("rejects unknown commands", async () => {
      await expect(run("launch")).resolves.toBe(EXIT_USAGE);
      expect(err).toEqual(["error: Unknown command: launch"]);
    });

    it("requires --server for serve", async () => {
      await expect(run("serve")).resolves.toBe(EXIT_USAGE);
      expect(err).toEqual(["error: --server <id> is required"]);
    });

    it("rejects --gpu together with --no-gpu", async () => {
      await expect(run("serve", "--server", "ollama", "--gpu", "--no-gpu")).resolves.toBe(EXIT_USAGE);
      expect(err).toEqual(["error: --gpu and --no-gpu are mutually exclusive"]);
    });

    it("rejects an invalid port before touching the runtime", async () => {
      await expect(run("serve", "--server", "ollama", "--port", "70000")).resolves.toBe(EXIT_USAGE);
      expect(err).toEqual(["error: Invalid port: 70000"]);
      expect(runtime.launches).toHaveLength(0);
    });

    it("rejects a malformed observation state", async () => {
      await expect(run("predict", "--server", "lerobot", "--state", "0.1,x")).resolves.toBe(EXIT_USAGE);
      expect(err).toEqual(["error: Invalid --state: 0.1,x"]);
    });

    it("rejects invalid configuration", async () => {
      const code = await runCli(["status"], {
        env: { AISERVE_HOME: home, LOG_LEVEL: "loud" },
        io: { out: (text) => out.push(text), err: (text) => err.push(text) },
        deps,
      });
      expect(code).toBe(EXIT_USAGE);
    });
  });

  describe("commands", () => {
    it("serves a backend", async () => {
      await expect(run("serve", "--server", "ollama")).resolves.toBe(EXIT_OK);
      expect(out).toEqual(["✔ ollama is running on http://127.0.0.1:11434 (model llama3.2:1b, real hardware)"]);
    });

    it("reports an unknown backend as a failure", async () => {
      await expect(run("serve", "--server", "tgi")).resolves.toBe(EXIT_FAILURE);
      expect(err[0].split("\n")[0]).toBe("error unknown_backend: Unknown backend: tgi");
    });

    it("shows status across invocations", async () => {
      await run("serve", "--server", "ollama", "--model", "qwen2.5:0.5b");
      out = [];

      await expect(run("status", "--probe")).resolves.toBe(EXIT_OK);

      expect(out).toEqual([
        "BACKEND  MODEL         PORT   HEALTH   LIVE\nollama   qwen2.5:0.5b  11434  running  up",
      ]);
    });

    it("stops what is running", async () => {
      await run("serve", "--server", "ollama");
      out = [];

      await expect(run("stop")).resolves.toBe(EXIT_OK);
      expect(out).toEqual(["Stopped ollama on port 11434"]);

      out = [];
      await expect(run("stop")).resolves.toBe(EXIT_OK);
      expect(out).toEqual(["Nothing to stop."]);
    });

    it("exits non-zero when a named backend is not running", async () => {
      await expect(run("stop", "--server", "vllm")).resolves.toBe(EXIT_FAILURE);
      expect(err[0].split("\n")[0]).toBe("warning not_running: No running instance of vllm");
    });

    it("exits non-zero when a stop fails", async () => {
      await run("serve", "--server", "ollama");
      runtime.failTerminate = () => new Error("daemon busy");

      await expect(run("stop")).resolves.toBe(EXIT_FAILURE);
      expect(err).toEqual([
        "error stop_failed: Failed to stop ollama:11434 (daemon busy)\n  failed  ollama on port 11434: daemon busy",
      ]);
    });

    it("lists backends", async () => {
      await expect(run("list")).resolves.toBe(EXIT_OK);
      const lines = out[0].split("\n");
      expect(lines[0]).toBe("Backends:");
      expect(lines.slice(-2)).toEqual(["Cached models:", "  (none)"]);
    });

    it("lists backends and profiles the host without a container runtime", async () => {
      vi.spyOn(runtime, "listManaged").mockRejectedValue(new Error("connect ENOENT /var/run/docker.sock"));

      await expect(run("list")).resolves.toBe(EXIT_OK);
      await expect(run("profile")).resolves.toBe(EXIT_OK);
      expect(err).toEqual([]);

      await expect(run("status")).resolves.toBe(EXIT_FAILURE);
      expect(err).toEqual(["error: connect ENOENT /var/run/docker.sock"]);
    });

    it("prints the hardware profile and a recommendation", async () => {
      await expect(run("profile")).resolves.toBe(EXIT_OK);
      expect(out[0].split("\n")[0]).toBe("Operating system: Linux 6.8.0 (x64)");
      expect(out[1]).toBe("Recommended backend: llama-cpp");
    });

    it("sends one observation to a robot backend", async () => {
      await run("serve", "--server", "lerobot", "--mock");
      out = [];

      await expect(run("predict", "--server", "lerobot", "--state", "0.1, 0.2")).resolves.toBe(EXIT_OK);

      expect(out).toEqual(["action:    [0.1, 0.2, 0.3]\ntimestamp: 1767225600\nmock_mode: true"]);
      const [, init] = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
      expect(JSON.parse(init.body)).toEqual({ observation: { state: [0.1, 0.2] } });
    });
  });
});
