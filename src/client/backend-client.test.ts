import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackendRequestError } from "../orchestrator/errors.js";
import { BackendClient } from "./backend-client.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("BackendClient.predict", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the observation and returns the parsed action", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ action: [0.5, -0.25], timestamp: 1767225600, info: { mock_mode: true, fps: 30 } })),
    );

    const result = await new BackendClient(5070).predict({ state: [0.1, 0.2], task: "pick" });

    expect(fetchMock).toHaveBeenCalledWith(
      "http://127.0.0.1:5070/predict",
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify({ observation: { state: [0.1, 0.2], task: "pick" } }),
      }),
    );
    expect(result).toEqual({ action: [0.5, -0.25], timestamp: 1767225600, info: { mock_mode: true, fps: 30 } });
  });

  it("wraps connection failures", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const err = await new BackendClient(5070).predict({ state: [] }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendRequestError);
    expect(err).toMatchObject({ message: "Cannot reach http://127.0.0.1:5070/predict" });
  });

  it("reports non-2xx responses with their body", async () => {
    fetchMock.mockResolvedValue(new Response("model not loaded", { status: 503 }));
    await expect(new BackendClient(5070).predict({ state: [] })).rejects.toThrow(
      "POST http://127.0.0.1:5070/predict failed: 503 model not loaded",
    );
  });

  it("rejects a body that is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("<html>"));
    await expect(new BackendClient(5070).predict({ state: [] })).rejects.toThrow("returned invalid JSON");
  });

  it("rejects a body without an action", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ timestamp: 1, info: { mock_mode: false } })));
    await expect(new BackendClient(5070).predict({ state: [] })).rejects.toThrow("returned an unexpected body");
  });

  it("uses the configured host", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ action: [], timestamp: 0, info: { mock_mode: false } })));
    await new BackendClient(8080, { host: "10.0.0.5" }).predict({ state: [] });
    expect(fetchMock.mock.calls[0][0]).toBe("http://10.0.0.5:8080/predict");
  });
});
