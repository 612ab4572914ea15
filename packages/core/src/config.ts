/**
 * Runtime configuration for the mapping packages.
 *
 * Reads configuration from environment variables:
 * - XMLMAP_LOG_LEVEL: pino level name (default "warn")
 *
 * Schemas themselves are declared in code; nothing here changes how a
 * document is mapped.
 */

import { z } from "zod";

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
	logLevel: z.enum(LOG_LEVELS).catch("warn"),
});

export type XmlMapConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from the environment.
 *
 * Unknown or malformed values fall back to their defaults.
 *
 * @param env - Environment to read (default: process.env)
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): XmlMapConfig {
	return configSchema.parse({
		logLevel: env["XMLMAP_LOG_LEVEL"]?.trim().toLowerCase(),
	});
}
