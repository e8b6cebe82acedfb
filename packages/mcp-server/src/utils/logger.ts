import pino from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type Level = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): Level {
  const match = LEVELS.find((level) => level === raw);
  return match ?? "info";
}

// Optional file-based debug logging, e.g. TAKE_FINDER_DEBUG_LOG=/tmp/take-finder.log
const DEBUG_LOG = process.env.TAKE_FINDER_DEBUG_LOG;

const streams: pino.StreamEntry[] = [
  // stdout carries the MCP protocol, so logs go to stderr; the root level filters
  { level: "trace", stream: process.stderr },
];
if (DEBUG_LOG) {
  streams.push({ level: "trace", stream: pino.destination({ dest: DEBUG_LOG, sync: false }) });
}

/**
 * Pino logger writing to stderr, plus a debug log file when configured
 */
export const logger = pino(
  {
    level: resolveLevel(process.env.TAKE_FINDER_LOG_LEVEL),
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  },
  pino.multistream(streams)
);
