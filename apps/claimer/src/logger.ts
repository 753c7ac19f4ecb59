import pino from "pino";
import type { ClaimerConfig } from "./config";

/**
 * Pino logger writing JSON lines to the log file and a readable stream to
 * stdout, both at the configured level.
 */
export function createLogger(logging: ClaimerConfig["logging"]): pino.Logger {
  const targets: pino.TransportTargetOptions[] = [
    {
      level: logging.level,
      target: "pino/file",
      options: { destination: logging.file, mkdir: true },
    },
    {
      level: logging.level,
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    },
  ];

  return pino(
    {
      level: logging.level,
      base: { service: "stakewell-claimer" },
    },
    pino.transport({ targets })
  );
}
