export type ScaleErrorCode =
	| "INVALID_FORMAT"
	| "INVALID_ARGUMENT"
	| "UNSUPPORTED_FORMAT"
	| "WORKER_ERROR";

/**
 * Raised for every rejected scale request. Validation failures are
 * deterministic, so callers should not retry on any of these codes.
 */
export class ScaleError extends Error {
	override readonly name = "ScaleError";

	constructor(
		message: string,
		public readonly code: ScaleErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export const isScaleError = (
	error: unknown,
	code?: ScaleErrorCode,
): error is ScaleError =>
	error instanceof ScaleError && (code === undefined || error.code === code);

export const assertPositiveInteger = (value: number, label: string): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ScaleError(
			`${label} must be a positive integer, got ${value}`,
			"INVALID_ARGUMENT",
		);
	}
};

/** Every resampler reads and writes packed 3-byte BGR pixels only. */
export const assertBgrFormat = (bytesPerPixel: number): void => {
	if (bytesPerPixel !== 3) {
		throw new ScaleError(
			`Pixel format must be 3 bytes per pixel (BGR), got ${bytesPerPixel}`,
			"INVALID_FORMAT",
		);
	}
};
