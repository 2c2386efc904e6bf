import pino, { type Logger } from "pino";
import { runtimeConfig } from "../config";

const isDevelopment = runtimeConfig.env === "development";

export const logger: Logger = pino({
  level: runtimeConfig.logLevel,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  base: {
    service: "binwise",
    env: runtimeConfig.env,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
