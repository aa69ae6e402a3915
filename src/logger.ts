import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

const STREAM_LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];
const STREAM_LEVEL = STREAM_LEVELS.find((level) => level === LOG_LEVEL) ?? "info";

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stdout and file receive the same records
  const streams: pino.StreamEntry[] = [
    { level: STREAM_LEVEL, stream: process.stdout },
    {
      level: STREAM_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const httpLogger = logger.child({ module: "http" });
export const sourceLogger = logger.child({ module: "source" });
export const warehouseLogger = logger.child({ module: "warehouse" });
export const syncLogger = logger.child({ module: "sync" });
export const backfillLogger = logger.child({ module: "backfill" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
