import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

// Cell contents are caller data; structural log records carry counts and indexes only.
export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      module: "elastic-matrix",
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
