import { availableParallelism } from "node:os";
import { assertPositiveInteger } from "./errors";
import { type LogLevel, Logger, isLogLevel } from "./logger";

const log = Logger.create("Config");

export const MAX_WORKERS = 8;

export interface ResampleConfig {
	/** Row bands per synchronous scale call. */
	parallelism: number;
	/** Worker threads started by a ScalerPool when none is requested. */
	workerCount: number;
	logLevel: LogLevel;
}

type Env = Readonly<Record<string, string | undefined>>;

const readPositiveInt = (
	env: Env,
	key: string,
	fallback: number,
): number => {
	const raw = env[key];
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		log.warn(`Ignoring ${key}="${raw}", expected a positive integer`);
		return fallback;
	}
	return value;
};

export const loadConfig = (env: Env = process.env): ResampleConfig => {
	const cores = Math.max(1, availableParallelism());

	const rawLevel = env.BITMAP_RESAMPLE_LOG_LEVEL?.trim().toUpperCase();
	let logLevel: LogLevel = "INFO";
	if (rawLevel) {
		if (isLogLevel(rawLevel)) {
			logLevel = rawLevel;
		} else {
			log.warn(`Ignoring BITMAP_RESAMPLE_LOG_LEVEL="${rawLevel}"`);
		}
	}

	return {
		parallelism: readPositiveInt(env, "BITMAP_RESAMPLE_PARALLELISM", cores),
		workerCount: Math.min(
			readPositiveInt(env, "BITMAP_RESAMPLE_WORKERS", cores),
			MAX_WORKERS,
		),
		logLevel,
	};
};

let current: ResampleConfig | null = null;

/** Loads the configuration once and applies its log level. */
export const getConfig = (): ResampleConfig => {
	if (!current) {
		current = loadConfig();
		Logger.setLevel(current.logLevel);
	}
	return current;
};

export const setConfig = (
	overrides: Partial<ResampleConfig>,
): ResampleConfig => {
	if (overrides.parallelism !== undefined) {
		assertPositiveInteger(overrides.parallelism, "parallelism");
	}
	if (overrides.workerCount !== undefined) {
		assertPositiveInteger(overrides.workerCount, "workerCount");
	}
	const next = { ...getConfig(), ...overrides };
	next.workerCount = Math.min(next.workerCount, MAX_WORKERS);
	if (overrides.logLevel) {
		Logger.setLevel(overrides.logLevel);
	}
	current = next;
	return next;
};

export const resetConfig = (): void => {
	current = null;
};

// The environment's log level applies from the first import on.
getConfig();
