/**
 * @kitty-wallet/wallet — Logging.
 *
 * One pino root logger per process; components log through child loggers
 * bound to their name.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { WalletConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<WalletConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Logger that drops everything; the default for library use and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
