import { parseArgs } from "node:util";
import { type Config, loadConfig } from "../config/index.js";
import { setLogLevel } from "../config/logger.js";
import { formatProfile } from "../hardware/recommend.js";
import type { ResolveOverrides } from "../orchestrator/config-resolver.js";
import { Session, type SessionDeps } from "../orchestrator/session.js";
import { formatError, formatList, formatPredict, formatServe, formatStatus } from "./output.js";

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  deps?: SessionDeps;
  /** Aborts an in-flight serve (Ctrl-C). */
  signal?: AbortSignal;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const HELP = `aiserve - launch and supervise AI-serving backends matched to this machine

Usage:
  aiserve serve --server <id> [--model <m>] [--port <n>] [--gpu|--no-gpu] [--mock] [--serial-device <path>]
  aiserve status [--probe]
  aiserve stop [--server <id>]
  aiserve list
  aiserve profile
  aiserve predict --server <id> --state <csv> [--port <n>] [--task <t>]

Options:
  --verbose   Log debug output to stderr
  --help      Show this help

Environment:
  AISERVE_HOME        State directory (default: ~/.aiserve)
  MOCK_HARDWARE       true forces simulated robot hardware
  HF_TOKEN            Passed to backends that download gated models`;

const OPTIONS = {
  server: { type: "string" },
  model: { type: "string" },
  port: { type: "string" },
  gpu: { type: "boolean" },
  "no-gpu": { type: "boolean" },
  mock: { type: "boolean" },
  "serial-device": { type: "string" },
  probe: { type: "boolean" },
  state: { type: "string" },
  task: { type: "string" },
  verbose: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

class UsageError extends Error {
  readonly name = "UsageError" as const;
}

type Values = ReturnType<typeof parse>["values"];

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

/** Parse `argv` (without node and script), run the command, and return the exit code. */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;

  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    io.err(formatError(err));
    io.err("Run `aiserve --help` for usage.");
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;
  const command = positionals[0];

  if (values.help || command === undefined || command === "help") {
    io.out(HELP);
    return EXIT_OK;
  }

  let config: Config;
  try {
    config = loadConfig(options.env ?? process.env);
  } catch (err) {
    io.err(formatError(err));
    return EXIT_USAGE;
  }
  setLogLevel(values.verbose ? "debug" : config.logLevel);

  try {
    return await dispatch(command, values, config, io, options);
  } catch (err) {
    io.err(formatError(err));
    return err instanceof UsageError ? EXIT_USAGE : EXIT_FAILURE;
  }
}

async function dispatch(
  command: string,
  values: Values,
  config: Config,
  io: CliIo,
  options: RunOptions,
): Promise<number> {
  if (!["serve", "status", "stop", "list", "profile", "predict"].includes(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  // Validate arguments before touching Docker.
  const overrides = command === "serve" ? serveOverrides(values) : {};
  if (command === "predict") requireServer(values);
  const predictState = command === "predict" ? parseState(values.state) : [];
  const port = values.port === undefined ? undefined : parsePort(values.port);

  const session = await Session.open(config, options.deps);

  switch (command) {
    case "serve": {
      const result = await session.serve(requireServer(values), overrides, { signal: options.signal });
      io.out(formatServe(result));
      return EXIT_OK;
    }
    case "status":
      io.out(formatStatus(await session.status({ probe: values.probe })));
      return EXIT_OK;
    case "stop": {
      const stopped = await session.stop(values.server);
      if (stopped.length === 0) io.out("Nothing to stop.");
      for (const s of stopped) io.out(`Stopped ${s.backendId} on port ${s.port}`);
      return EXIT_OK;
    }
    case "list": {
      const { backends, models } = await session.list();
      io.out(formatList(backends, models));
      return EXIT_OK;
    }
    case "profile": {
      const { profile, recommended } = await session.describeHardware();
      io.out(formatProfile(profile));
      io.out(`Recommended backend: ${recommended}`);
      return EXIT_OK;
    }
    default: {
      const response = await session.predict(requireServer(values), {
        state: predictState,
        task: values.task,
        port,
      });
      io.out(formatPredict(response));
      return EXIT_OK;
    }
  }
}

function serveOverrides(values: Values): ResolveOverrides {
  requireServer(values);
  if (values.gpu && values["no-gpu"]) throw new UsageError("--gpu and --no-gpu are mutually exclusive");
  return {
    model: values.model,
    port: values.port === undefined ? undefined : parsePort(values.port),
    gpu: values.gpu ? true : values["no-gpu"] ? false : undefined,
    mockHardware: values.mock ? true : undefined,
    serialDevice: values["serial-device"],
  };
}

function requireServer(values: Values): string {
  if (!values.server) throw new UsageError("--server <id> is required");
  return values.server;
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) throw new UsageError(`Invalid port: ${raw}`);
  return port;
}

/** "0.1, 0.2,0.3" → [0.1, 0.2, 0.3] */
function parseState(raw: string | undefined): number[] {
  if (!raw) throw new UsageError("--state <csv> is required");
  const state = raw.split(",").map((s) => Number(s.trim()));
  if (state.some((n) => !Number.isFinite(n))) throw new UsageError(`Invalid --state: ${raw}`);
  return state;
}
