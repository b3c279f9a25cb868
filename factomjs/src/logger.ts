import { type Logger, pino } from "pino";

/**
 * The logger used by clients that are not given one.
 * Silent unless `FACTOMJS_LOG_LEVEL` is set.
 */
const defaultLogger: Logger = pino({
  name: "factomjs",
  level: process.env.FACTOMJS_LOG_LEVEL ?? "silent",
});

export { defaultLogger };
export type { Logger };
