import { ScaleError } from "./errors";
import { scale, validateScaleRequest } from "./scaler";
import type { InterpolationMode, Rect, Size } from "./types";
import type { PixelBuffer } from "./utils/pixel-buffer";

/** The centered region that `zoomPercent` magnifies back to full size. */
export const zoomRect = (size: Size, zoomPercent: number): Rect => {
	if (!(zoomPercent >= 0)) {
		throw new ScaleError(
			`Zoom percent must be zero or positive, got ${zoomPercent}`,
			"INVALID_ARGUMENT",
		);
	}

	const inverse = 1 / (1 + zoomPercent / 100);
	const width = Math.trunc(size.width * inverse);
	const height = Math.trunc(size.height * inverse);
	if (width < 1 || height < 1) {
		throw new ScaleError(
			`Zooming ${size.width}x${size.height} by ${zoomPercent}% leaves no pixels`,
			"INVALID_ARGUMENT",
		);
	}

	return {
		x: Math.trunc(size.width / 2) - Math.trunc(width / 2),
		y: Math.trunc(size.height / 2) - Math.trunc(height / 2),
		width,
		height,
	};
};

/**
 * Crops the region `zoomPercent` magnifies and scales it straight to
 * `outW` x `outH`, so pixels are interpolated once.
 */
export const zoomAndScale = (
	source: PixelBuffer,
	zoomPercent: number,
	mode: InterpolationMode,
	outW: number,
	outH: number,
	parallelism?: number,
): PixelBuffer => {
	validateScaleRequest(source, outW, outH);
	const cropped = source.crop(zoomRect(source, zoomPercent));
	return scale(cropped, outW, outH, mode, parallelism);
};

/**
 * Magnifies the center of `source` by `zoomPercent` (100 doubles it) and
 * returns a buffer of the source's size.
 */
export const zoom = (
	source: PixelBuffer,
	zoomPercent: number,
	mode: InterpolationMode,
	parallelism?: number,
): PixelBuffer =>
	zoomAndScale(
		source,
		zoomPercent,
		mode,
		source.width,
		source.height,
		parallelism,
	);
