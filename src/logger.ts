import pino, { type DestinationStream, type Logger } from "pino";

export interface LoggerConfig {
  level: "debug" | "info" | "warn" | "error";
  format: "json" | "pretty";
}

const REDACT_PATHS = ["headers.authorization", "headers.cookie", "*.headers.authorization", "*.headers.cookie"];

/** Auth and cookie headers are redacted wherever a request's headers are logged. */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  if (config.format === "pretty" && !destination) {
    return pino({
      level: config.level,
      base: undefined,
      redact: REDACT_PATHS,
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(
    {
      level: config.level,
      base: undefined,
      redact: REDACT_PATHS,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination({ dest: 2, sync: false }),
  );
}
