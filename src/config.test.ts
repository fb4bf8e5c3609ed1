import { availableParallelism } from "node:os";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
	MAX_WORKERS,
	getConfig,
	loadConfig,
	resetConfig,
	setConfig,
} from "./config";
import { isScaleError } from "./errors";
import { Logger } from "./logger";

const cores = Math.max(1, availableParallelism());

describe("loadConfig", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		Logger.clearBuffer();
	});

	it("defaults to the machine's cores", () => {
		expect(loadConfig({})).toEqual({
			parallelism: cores,
			workerCount: Math.min(cores, MAX_WORKERS),
			logLevel: "INFO",
		});
	});

	it("reads overrides from the environment", () => {
		expect(
			loadConfig({
				BITMAP_RESAMPLE_PARALLELISM: "3",
				BITMAP_RESAMPLE_WORKERS: "2",
				BITMAP_RESAMPLE_LOG_LEVEL: "debug",
			}),
		).toEqual({ parallelism: 3, workerCount: 2, logLevel: "DEBUG" });
	});

	it("caps the worker count", () => {
		expect(loadConfig({ BITMAP_RESAMPLE_WORKERS: "20" }).workerCount).toBe(
			MAX_WORKERS,
		);
	});

	it("warns about and ignores malformed values", () => {
		vi.spyOn(console, "warn").mockImplementation(() => {});

		const config = loadConfig({
			BITMAP_RESAMPLE_PARALLELISM: "abc",
			BITMAP_RESAMPLE_LOG_LEVEL: "loud",
		});

		expect(config.parallelism).toBe(cores);
		expect(config.logLevel).toBe("INFO");
		expect(Logger.getBuffer("WARN").map((e) => e.message)).toEqual([
			'Ignoring BITMAP_RESAMPLE_LOG_LEVEL="LOUD"',
			'Ignoring BITMAP_RESAMPLE_PARALLELISM="abc", expected a positive integer',
		]);
	});
});

describe("setConfig", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
		resetConfig();
		Logger.setLevel("INFO");
	});

	it("applies the environment's log level when first loaded", () => {
		vi.stubEnv("BITMAP_RESAMPLE_LOG_LEVEL", "warn");
		resetConfig();
		expect(getConfig().logLevel).toBe("WARN");
		expect(Logger.getLevel()).toBe("WARN");
	});

	it("memoizes the loaded config", () => {
		expect(getConfig()).toBe(getConfig());
	});

	it("overrides individual settings", () => {
		const next = setConfig({ parallelism: 3, workerCount: 12 });
		expect(next.parallelism).toBe(3);
		expect(next.workerCount).toBe(MAX_WORKERS);
		expect(getConfig()).toBe(next);
	});

	it("applies the log level to the logger", () => {
		setConfig({ logLevel: "WARN" });
		expect(Logger.getLevel()).toBe("WARN");
	});

	it("rejects non-positive counts", () => {
		let caught: unknown;
		try {
			setConfig({ parallelism: 0 });
		} catch (error) {
			caught = error;
		}
		expect(isScaleError(caught, "INVALID_ARGUMENT")).toBe(true);
	});
});
