import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { createLogger, logger } from "../src/logger";

describe("loadConfig", () => {
	it("defaults the log level to warn", () => {
		expect(loadConfig({})).toEqual({ logLevel: "warn" });
	});

	it("reads XMLMAP_LOG_LEVEL", () => {
		expect(loadConfig({ XMLMAP_LOG_LEVEL: "debug" }).logLevel).toBe("debug");
	});

	it("normalizes case and whitespace", () => {
		expect(loadConfig({ XMLMAP_LOG_LEVEL: " TRACE " }).logLevel).toBe("trace");
	});

	it("falls back to warn for unknown levels", () => {
		expect(loadConfig({ XMLMAP_LOG_LEVEL: "verbose" }).logLevel).toBe("warn");
	});
});

describe("createLogger", () => {
	it("returns a child logger bound to the module name", () => {
		const log = createLogger("descriptor");
		expect(log.bindings()).toMatchObject({ module: "descriptor" });
		expect(log.level).toBe(logger.level);
	});
});
