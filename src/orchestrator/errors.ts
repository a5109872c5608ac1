/**
 * Error taxonomy for the orchestration engine.
 *
 * Every error carries a stable `code` (printed by the CLI), an optional
 * remediation `hint`, and whether it is `fatal` for the command that raised it.
 * Device absence has no error class: it only downgrades to mock hardware.
 */
export abstract class OrchestratorError extends Error {
  abstract readonly code: string;
  readonly hint: string | undefined;
  readonly fatal: boolean = true;

  constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.hint = options.hint;
  }
}

/** Mandatory baseline fields (OS, CPU core count) could not be read. */
export class HardwareDetectionError extends OrchestratorError {
  readonly name = "HardwareDetectionError" as const;
  readonly code = "hardware_detection";
  constructor(field: string, cause?: unknown) {
    super(`Cannot read mandatory hardware field: ${field}`, { cause });
  }
}

export class UnknownBackendError extends OrchestratorError {
  readonly name = "UnknownBackendError" as const;
  readonly code = "unknown_backend";
  readonly backendId: string;
  constructor(backendId: string, known: readonly string[]) {
    super(`Unknown backend: ${backendId}`, {
      hint: known.length > 0 ? `Known backends: ${known.join(", ")}` : "No backends are registered",
    });
    this.backendId = backendId;
  }
}

export class ImageNotFoundError extends OrchestratorError {
  readonly name = "ImageNotFoundError" as const;
  readonly code = "image_not_found";
  constructor(backendId: string, vendor: string) {
    super(`Backend ${backendId} defines no image for GPU vendor "${vendor}" and no cpu fallback`, {
      hint: `Add an "${vendor}" or "cpu" entry under images in the ${backendId} backend definition`,
    });
  }
}

export class PortConflictError extends OrchestratorError {
  readonly name = "PortConflictError" as const;
  readonly code = "port_conflict";
  readonly port: number;
  /** Backend occupying the port, or null when a process outside aiserve holds it. */
  readonly holder: string | null;
  constructor(port: number, holder: string | null) {
    super(
      holder
        ? `Port ${port} is already used by backend ${holder}`
        : `Port ${port} is already in use by another process`,
      {
        hint: holder
          ? `Pick another --port or run \`aiserve stop --server ${holder}\` first`
          : "Pick another --port or free the port",
      },
    );
    this.port = port;
    this.holder = holder;
  }
}

export class GpuUnavailableError extends OrchestratorError {
  readonly name = "GpuUnavailableError" as const;
  readonly code = "gpu_unavailable";
  constructor(reason: string, cause?: unknown) {
    super(`GPU was requested but is not available: ${reason}`, {
      hint: "Drop --gpu to run on the CPU image",
      cause,
    });
  }
}

/** The container runtime refused or failed the launch. The runtime error is kept as `cause`. */
export class ContainerLaunchError extends OrchestratorError {
  readonly name = "ContainerLaunchError" as const;
  readonly code = "container_launch";
  readonly backendId: string;
  constructor(backendId: string, detail: string, cause?: unknown) {
    super(`Failed to launch ${backendId}: ${detail}`, {
      hint: "Check that the Docker daemon is running and the image and devices are available",
      cause,
    });
    this.backendId = backendId;
  }
}

/** The instance did not become ready in time. It stays registered as unhealthy. */
export class HealthCheckTimeoutError extends OrchestratorError {
  readonly name = "HealthCheckTimeoutError" as const;
  readonly code = "health_check_timeout";
  override readonly fatal = false;
  readonly backendId: string;
  readonly port: number;
  constructor(backendId: string, port: number, timeoutMs: number) {
    super(`${backendId} on port ${port} did not become ready within ${Math.round(timeoutMs / 1000)}s`, {
      hint: `The container is still running; check \`aiserve status\` or stop it with \`aiserve stop --server ${backendId}\``,
    });
    this.backendId = backendId;
    this.port = port;
  }
}

export class NotRunningError extends OrchestratorError {
  readonly name = "NotRunningError" as const;
  readonly code = "not_running";
  override readonly fatal = false;
  constructor(backendId: string) {
    super(`No running instance of ${backendId}`, { hint: "Run `aiserve status` to see running instances" });
  }
}

export interface StopFailure {
  backendId: string;
  port: number;
  error: Error;
}

/** One or more instances failed to stop; the others were stopped anyway. */
export class StopFailedError extends OrchestratorError {
  readonly name = "StopFailedError" as const;
  readonly code = "stop_failed";
  readonly stopped: ReadonlyArray<{ backendId: string; port: number }>;
  readonly failures: readonly StopFailure[];
  constructor(stopped: ReadonlyArray<{ backendId: string; port: number }>, failures: readonly StopFailure[]) {
    super(`Failed to stop ${failures.map((f) => `${f.backendId}:${f.port} (${f.error.message})`).join(", ")}`);
    this.stopped = stopped;
    this.failures = failures;
  }
}

export class StartCancelledError extends OrchestratorError {
  readonly name = "StartCancelledError" as const;
  readonly code = "start_cancelled";
  constructor(backendId: string) {
    super(`Start of ${backendId} was cancelled`);
  }
}

export class CatalogLoadError extends OrchestratorError {
  readonly name = "CatalogLoadError" as const;
  readonly code = "catalog_load";
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class BackendRequestError extends OrchestratorError {
  readonly name = "BackendRequestError" as const;
  readonly code = "backend_request";
  constructor(message: string, cause?: unknown) {
    super(message, { hint: "Check that the backend is running with `aiserve status --probe`", cause });
  }
}
