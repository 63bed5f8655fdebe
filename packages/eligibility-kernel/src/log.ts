import pino from "pino";

/**
 * Minimal logger surface the kernel needs. pino loggers satisfy it.
 */
export type KernelLoggerV1 = {
  warn(obj: object, msg: string): void;
};

/**
 * A level pino accepts; unknown or absent values fall back to "info".
 */
export function resolveLogLevelV1(raw: string | undefined): string {
  if (raw === undefined) return "info";
  if (raw === "silent" || Object.prototype.hasOwnProperty.call(pino.levels.values, raw)) return raw;
  return "info";
}

export const kernelLogger: KernelLoggerV1 = pino({
  name: "eligibility-kernel",
  level: resolveLogLevelV1(process.env.LOG_LEVEL)
});
