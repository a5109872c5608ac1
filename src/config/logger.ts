import winston from "winston";

const LEVELS = ["error", "warn", "info", "debug"] as const;
type LogLevel = (typeof LEVELS)[number];

function levelFromEnv(raw: string | undefined): LogLevel {
  return LEVELS.find((l) => l === raw) ?? "warn";
}

/**
 * Process-wide logger. Everything goes to stderr so command output on stdout
 * stays machine-readable.
 */
export const logger = winston.createLogger({
  level: levelFromEnv(process.env.LOG_LEVEL),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, errorReplacer)}` : "";
      return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: [...LEVELS] })],
});

/** Change the level at runtime (CLI --verbose). */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
