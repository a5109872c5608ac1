import chalk from "chalk";
import type { ServerDescriptor } from "../catalog/backend-schema.js";
import type { PredictResponse } from "../client/backend-client.js";
import type { CachedModel } from "../models/model-cache.js";
import { OrchestratorError, StopFailedError } from "../orchestrator/errors.js";
import type { InstanceStatus, ServeResult } from "../orchestrator/session.js";

export function formatServe(result: ServeResult): string {
  const { record, reused } = result;
  const verb = reused ? "is already running" : "is running";
  const mode = record.hardwareMode === "mock" ? chalk.yellow("mock hardware") : "real hardware";
  return `${chalk.green("✔")} ${record.backendId} ${verb} on http://127.0.0.1:${record.port} (model ${record.model}, ${mode})`;
}

/** Fixed-width table; the LIVE column only appears for probed output. */
export function formatStatus(rows: readonly InstanceStatus[]): string {
  if (rows.length === 0) return "No running instances.";
  const probed = rows.some((r) => r.live !== null);
  const header = ["BACKEND", "MODEL", "PORT", "HEALTH", ...(probed ? ["LIVE"] : [])];
  const body = rows.map(({ record, live }) => [
    record.backendId,
    record.model,
    String(record.port),
    record.healthState,
    ...(probed ? [live ? "up" : "down"] : []),
  ]);
  return table([header, ...body]);
}

export function formatList(backends: readonly ServerDescriptor[], models: readonly CachedModel[]): string {
  const lines = ["Backends:"];
  lines.push(
    ...table(backends.map((b) => [b.id, b.kind, b.description]))
      .split("\n")
      .map((l) => `  ${l}`),
  );
  lines.push("", "Cached models:");
  if (models.length === 0) lines.push("  (none)");
  else lines.push(...models.map((m) => `  ${m.id}`));
  return lines.join("\n");
}

export function formatPredict(response: PredictResponse): string {
  return [
    `action:    [${response.action.join(", ")}]`,
    `timestamp: ${response.timestamp}`,
    `mock_mode: ${response.info.mock_mode}`,
  ].join("\n");
}

/** `code: message`, the hint, and for an aggregate stop failure one line per instance. */
export function formatError(err: unknown): string {
  if (!(err instanceof OrchestratorError)) {
    return `${chalk.red("error")}: ${err instanceof Error ? err.message : String(err)}`;
  }
  const label = err.fatal ? chalk.red("error") : chalk.yellow("warning");
  const lines = [`${label} ${err.code}: ${err.message}`];
  if (err instanceof StopFailedError) {
    for (const s of err.stopped) lines.push(`  stopped ${s.backendId} on port ${s.port}`);
    for (const f of err.failures) lines.push(`  failed  ${f.backendId} on port ${f.port}: ${f.error.message}`);
  }
  if (err.hint) lines.push(chalk.dim(`  hint: ${err.hint}`));
  return lines.join("\n");
}

function table(rows: readonly string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd()).join("\n");
}
