import { pino, type Logger } from "pino";
import type { Address } from "viem";
import { config } from "../config/index.js";

export const logger: Logger = pino({
  name: config.appName,
  level: config.logLevel,
});

export function marketLogger(market: Address): Logger {
  return logger.child({ market });
}
