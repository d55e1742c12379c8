import { cfg, LOG_LEVELS, type LogLevel } from "./config.js";

const threshold = LOG_LEVELS.indexOf(cfg.LOG_LEVEL);
const on = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

/** Tiny logger wrapper for consistent tags; LOG_LEVEL sets the floor */
export const log = {
  debug: (...a: unknown[]) => {
    if (on("debug")) console.debug(new Date().toISOString(), "[DEBUG]", ...a);
  },
  info: (...a: unknown[]) => {
    if (on("info")) console.log(new Date().toISOString(), "[INFO]", ...a);
  },
  warn: (...a: unknown[]) => {
    if (on("warn")) console.warn(new Date().toISOString(), "[WARN]", ...a);
  },
  error: (...a: unknown[]) => {
    if (on("error")) console.error(new Date().toISOString(), "[ERROR]", ...a);
  },
};
