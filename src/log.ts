import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(level: LogLevel, filePath?: string, fileLevel?: LogLevel): Logger {
  if (!filePath) {
    return pino({ level, base: { service: "taskboard" } });
  }
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }
  const streams = [
    { level: toStreamLevel(level), stream: process.stdout },
    {
      level: toStreamLevel(fileLevel ?? level),
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ level: "trace", base: { service: "taskboard" } }, multistream(streams));
}

// multistream entries take real levels only; "silent" on a sink means it never fires
function toStreamLevel(level: LogLevel): pino.Level {
  return level === "silent" ? "fatal" : level;
}
