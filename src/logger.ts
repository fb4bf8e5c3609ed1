/**
 * Module logger.
 *
 * Usage:
 *   import { Logger } from "./logger";
 *   const log = Logger.create("Scaler");
 *   log.debug("dispatch", { mode: "bicubic" });
 *   const done = log.time("bicubic 640x480");
 *   done();
 *
 * Environment:
 *   BITMAP_RESAMPLE_DEBUG=Scaler,ScalerPool   modules whose debug output is shown ("*" = all)
 *
 * The minimum level starts at INFO; `getConfig()` applies BITMAP_RESAMPLE_LOG_LEVEL.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	module: string;
	message: string;
	data?: unknown;
}

interface LoggerConfig {
	enabled: string[];
	level: LogLevel;
	bufferSize: number;
}

const LOG_LEVELS: Record<LogLevel, number> = {
	DEBUG: 0,
	INFO: 1,
	WARN: 2,
	ERROR: 3,
};

export const isLogLevel = (value: string): value is LogLevel =>
	Object.hasOwn(LOG_LEVELS, value);

const parseModules = (value: string | undefined): string[] =>
	(value ?? "")
		.split(",")
		.map((m) => m.trim())
		.filter((m) => m.length > 0);

const logBuffer: LogEntry[] = [];
const registeredModules = new Set<string>();

const config: LoggerConfig = {
	enabled: parseModules(process.env.BITMAP_RESAMPLE_DEBUG),
	level: "INFO",
	bufferSize: 500,
};

class ModuleLogger {
	constructor(private readonly module: string) {
		registeredModules.add(module);
	}

	debug(message: string, data?: unknown): void {
		this.log("DEBUG", message, data);
	}

	info(message: string, data?: unknown): void {
		this.log("INFO", message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log("WARN", message, data);
	}

	error(message: string, error?: unknown): void {
		this.log("ERROR", message, error);
	}

	/** Returns a function that logs the elapsed time when called. */
	time(label: string): () => void {
		const start = performance.now();
		return () => {
			const duration = (performance.now() - start).toFixed(2);
			this.debug(`${label} completed in ${duration}ms`);
		};
	}

	private log(level: LogLevel, message: string, data?: unknown): void {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			module: this.module,
			message,
			data,
		};
		logBuffer.push(entry);
		if (logBuffer.length > config.bufferSize) {
			logBuffer.splice(0, logBuffer.length - config.bufferSize);
		}

		if (!this.shouldLog(level)) return;

		const args: unknown[] = [`[${level}] [${this.module}]`, message];
		if (data !== undefined) {
			args.push(data);
		}

		switch (level) {
			case "DEBUG":
				console.debug(...args);
				break;
			case "INFO":
				console.info(...args);
				break;
			case "WARN":
				console.warn(...args);
				break;
			case "ERROR":
				console.error(...args);
				break;
		}
	}

	private shouldLog(level: LogLevel): boolean {
		if (level === "ERROR") return true;
		if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) return false;
		if (level === "DEBUG") {
			return (
				config.enabled.includes("*") || config.enabled.includes(this.module)
			);
		}
		return true;
	}
}

export const Logger = {
	create(module: string): ModuleLogger {
		return new ModuleLogger(module);
	},

	/** Show debug output for the given comma-separated modules, or "*". */
	enable(modules: string): void {
		config.enabled = parseModules(modules);
	},

	disable(): void {
		config.enabled = [];
	},

	setLevel(level: LogLevel): void {
		config.level = level;
	},

	getLevel(): LogLevel {
		return config.level;
	},

	getBuffer(level?: LogLevel): LogEntry[] {
		return level
			? logBuffer.filter((entry) => entry.level === level)
			: [...logBuffer];
	},

	clearBuffer(): void {
		logBuffer.length = 0;
	},

	modules(): string[] {
		return [...registeredModules].sort();
	},
};

export type { ModuleLogger };
