import { getScaler } from "./algorithms";
import { getConfig } from "./config";
import { assertBgrFormat, assertPositiveInteger } from "./errors";
import { Logger } from "./logger";
import type { InterpolationMode } from "./types";
import type { PixelBuffer } from "./utils/pixel-buffer";
import { fitWithinAspect } from "./utils/positioning";

const log = Logger.create("Scaler");

/**
 * Rejects requests every resampler would refuse: only 3-byte BGR sources
 * are accepted, whatever the mode.
 */
export const validateScaleRequest = (
	source: PixelBuffer,
	targetW: number,
	targetH: number,
): void => {
	assertBgrFormat(source.bytesPerPixel);
	assertPositiveInteger(targetW, "Target width");
	assertPositiveInteger(targetH, "Target height");
};

/**
 * Resamples `source` to `targetW` x `targetH`.
 *
 * Minification is not prefiltered: shrinking samples a few source pixels per
 * output pixel and behaves much like nearest-neighbour in every mode.
 *
 * @param parallelism Row bands to split the output into; defaults to the
 *   configured parallelism. The output does not depend on it.
 * @throws {ScaleError} `INVALID_FORMAT` for non-BGR sources,
 *   `INVALID_ARGUMENT` for non-positive sizes or parallelism.
 */
export const scale = (
	source: PixelBuffer,
	targetW: number,
	targetH: number,
	mode: InterpolationMode,
	parallelism?: number,
): PixelBuffer => {
	validateScaleRequest(source, targetW, targetH);
	const bands = parallelism ?? getConfig().parallelism;
	assertPositiveInteger(bands, "parallelism");

	if (source.width === targetW && source.height === targetH) {
		log.debug("Target size equals source size, copying");
		return source.clone();
	}

	const scaler = getScaler(mode);
	if (scaler.id !== mode) {
		log.debug(`Unknown mode "${mode}", using ${scaler.name}`);
	}

	const done = log.time(
		`${scaler.name} ${source.width}x${source.height} -> ${targetW}x${targetH}`,
	);
	const result = scaler.resample(source, targetW, targetH, bands);
	done();
	return result;
};

/** Scales to the largest size with the source's aspect ratio that fits the box. */
export const scaleToFit = (
	source: PixelBuffer,
	boxW: number,
	boxH: number,
	mode: InterpolationMode,
	parallelism?: number,
): PixelBuffer => {
	const size = fitWithinAspect(source, { width: boxW, height: boxH });
	return scale(source, size.width, size.height, mode, parallelism);
};
