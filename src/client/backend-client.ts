import { z } from "zod";
import { logger } from "../config/logger.js";
import { BackendRequestError } from "../orchestrator/errors.js";

export interface Observation {
  /** Joint positions and other proprioceptive readings. */
  state: number[];
  /** Base64-encoded camera frame. */
  image?: string;
  task?: string;
}

export const predictResponseSchema = z.object({
  action: z.array(z.number()),
  timestamp: z.number(),
  info: z.object({ mock_mode: z.boolean() }).passthrough(),
});

export type PredictResponse = z.infer<typeof predictResponseSchema>;

export interface BackendClientOptions {
  host?: string;
  /** Per-request timeout in ms. Default: 10000 */
  timeoutMs?: number;
}

/** HTTP client for the endpoints a served backend exposes. */
export class BackendClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(port: number, options: BackendClientOptions = {}) {
    this.baseUrl = `http://${options.host ?? "127.0.0.1"}:${port}`;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /** Ask a robot-control backend for the next action. */
  async predict(observation: Observation): Promise<PredictResponse> {
    const url = `${this.baseUrl}/predict`;
    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ observation }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new BackendRequestError(`Cannot reach ${url}`, err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new BackendRequestError(`POST ${url} failed: ${res.status}${text ? ` ${text}` : ""}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new BackendRequestError(`POST ${url} returned invalid JSON`, err);
    }
    const parsed = predictResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.debug("Unexpected predict response", { issues: parsed.error.issues });
      throw new BackendRequestError(`POST ${url} returned an unexpected body`);
    }
    return parsed.data;
  }
}
