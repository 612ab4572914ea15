import pino from "pino";
import type { Logger } from "pino";
import { loadConfig } from "./config";

export type { Logger };

/** Root logger shared by all xmlmap packages */
export const logger: Logger = pino({
	name: "xmlmap",
	level: loadConfig().logLevel,
});

/**
 * Child logger bound to a module name
 *
 * @example
 * const log = createLogger("descriptor");
 * log.debug({ fields: 3 }, "resolved descriptor table");
 */
export function createLogger(module: string): Logger {
	return logger.child({ module });
}
