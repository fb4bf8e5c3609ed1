/** Saturating float-to-byte conversion shared by every resampler. */
export const clampToByte = (v: number): number => {
	if (v < 0) return 0;
	if (v > 255) return 255;
	return (v + 0.5) | 0;
};

/** Rounds to the nearest integer, ties to the even neighbour. */
export const roundHalfEven = (v: number): number => {
	const floor = Math.floor(v);
	const diff = v - floor;
	if (diff > 0.5) return floor + 1;
	if (diff < 0.5) return floor;
	return floor % 2 === 0 ? floor : floor + 1;
};

/** Source coordinate of an output pixel's center under the half-pixel convention. */
export const sampleCenter = (out: number, ratio: number): number =>
	(out + 0.5) * ratio;
