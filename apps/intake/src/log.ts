import pino from "pino";
import type { Logger } from "pino";

import { resolveLogLevelV1 } from "@trial-intake/eligibility-kernel";

export type { Logger };

/**
 * Module logger. One pino instance per component, level from LOG_LEVEL.
 */
export function createLogger(name: string, level: string = resolveLogLevelV1(process.env.LOG_LEVEL)): Logger {
  return pino({ name, level });
}
