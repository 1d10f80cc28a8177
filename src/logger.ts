import pino from "pino";
import { config } from "./config.js";

export type Logger = pino.Logger;

const rootLogger = pino({
  name: "ingest-dashboard",
  level: config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
