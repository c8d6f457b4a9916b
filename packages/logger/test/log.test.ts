import loglevel from "loglevel";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { Logger } from "../src/index.js";

describe("Logger test", () => {
	let logger: Logger;
	beforeEach(() => {
		logger = new Logger("logger_test");
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("should be a function", () => {
		expect(typeof Logger).toBe("function");
	});

	test("should be constructor", () => {
		expect(logger).toBeInstanceOf(Logger);
	});

	test("defaults to the info level", () => {
		expect(logger.level).toBe(loglevel.levels.INFO);
	});

	test("applies the configured level", () => {
		const quiet = new Logger("logger_test::quiet", { level: "silent" });
		expect(quiet.level).toBe(loglevel.levels.SILENT);

		const verbose = new Logger("logger_test::verbose", { level: "trace" });
		expect(verbose.level).toBe(loglevel.levels.TRACE);
	});

	test("drops messages below the level", () => {
		const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
		const infoLogger = new Logger("logger_test::drop", { level: "info" });
		infoLogger.debug("hidden");
		expect(logSpy).not.toHaveBeenCalled();
		expect(debugSpy).not.toHaveBeenCalled();
	});

	test("prefixes messages with the context name", () => {
		const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
		const warnLogger = new Logger("logger_test::prefix", { level: "warn" });
		warnLogger.warn("careful");
		expect(spy).toHaveBeenCalledTimes(1);
		expect(String(spy.mock.calls[0][0])).toContain("logger_test::prefix");
	});
});
