import pino from "pino";
import pinoPretty from "pino-pretty";

const LEVELS: readonly string[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/**
 * Resolve the log level from LOG_LEVEL, falling back to debug in development and info
 * elsewhere. Unknown names fall back too, so a typo never stops the relay from starting.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.LOG_LEVEL?.trim().toLowerCase();
  if (fromEnv && LEVELS.includes(fromEnv)) return fromEnv;
  return env.NODE_ENV === "development" ? "debug" : "info";
}

const usePretty =
  process.env.LOG_PRETTY === "1" || process.env.NODE_ENV === "development";

// stdout is the caller-facing MCP channel; everything we log goes to stderr.
const prettyStream = usePretty
  ? pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
      destination: 2,
    })
  : undefined;

export const logger = pino(
  {
    level: resolveLogLevel(),
    base: { name: "effect-gate" },
  },
  prettyStream ?? pino.destination(2),
);

export type Logger = pino.Logger;
