import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
	beforeEach(() => {
		Logger.setLevel("INFO");
		Logger.disable();
		Logger.clearBuffer();
	});

	afterEach(() => {
		vi.restoreAllMocks();
		Logger.setLevel("INFO");
		Logger.disable();
		Logger.clearBuffer();
	});

	it("prefixes console output with level and module", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const log = Logger.create("Test");

		log.info("hello");
		log.warn("careful", { rows: 3 });

		expect(info).toHaveBeenCalledWith("[INFO] [Test]", "hello");
		expect(warn).toHaveBeenCalledWith("[WARN] [Test]", "careful", { rows: 3 });
	});

	it("shows debug output only for enabled modules", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const log = Logger.create("Test");
		Logger.setLevel("DEBUG");

		log.debug("hidden");
		expect(debug).not.toHaveBeenCalled();

		Logger.enable("Other, Test");
		log.debug("shown");
		expect(debug).toHaveBeenCalledWith("[DEBUG] [Test]", "shown");

		Logger.enable("*");
		log.debug("wildcard");
		expect(debug).toHaveBeenCalledTimes(2);
	});

	it("filters by level but always prints errors", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const log = Logger.create("Test");
		Logger.setLevel("ERROR");

		log.info("quiet");
		log.error("loud");

		expect(info).not.toHaveBeenCalled();
		expect(error).toHaveBeenCalledWith("[ERROR] [Test]", "loud");
		expect(Logger.getLevel()).toBe("ERROR");
	});

	it("buffers every entry, printed or not", () => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
		const log = Logger.create("Test");

		log.debug("one");
		log.warn("two");

		expect(Logger.getBuffer().map((e) => e.message)).toEqual(["one", "two"]);
		expect(Logger.getBuffer("WARN")).toHaveLength(1);
		expect(Logger.getBuffer("WARN")[0].module).toBe("Test");
	});

	it("keeps only the most recent 500 entries", () => {
		vi.spyOn(console, "info").mockImplementation(() => {});
		const log = Logger.create("Test");
		for (let i = 0; i < 510; i++) {
			log.info(`message ${i}`);
		}

		const buffer = Logger.getBuffer();
		expect(buffer).toHaveLength(500);
		expect(buffer[0].message).toBe("message 10");
		expect(buffer[499].message).toBe("message 509");
	});

	it("times a section as a debug entry", () => {
		const log = Logger.create("Test");
		const done = log.time("resize");
		done();

		const [entry] = Logger.getBuffer("DEBUG");
		expect(entry.message).toMatch(/^resize completed in \d+\.\d{2}ms$/);
	});

	it("lists registered modules", () => {
		Logger.create("Zeta");
		Logger.create("Alpha");
		const modules = Logger.modules();
		expect(modules).toContain("Zeta");
		expect(modules.indexOf("Alpha")).toBeLessThan(modules.indexOf("Zeta"));
	});
});
