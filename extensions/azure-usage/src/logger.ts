import pino from "pino";
import type { AzureUsageConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<AzureUsageConfig["logging"]>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    level,
    name: "azure-usage",
    ...(transport ? { transport } : {}),
  };

  if (isJson) {
    return pino(options, pino.destination(2));
  }
  return pino(options);
}

/** Logger used by library components when the caller does not pass one. */
export const silentLogger: Logger = pino({ level: "silent" });
