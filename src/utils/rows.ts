import type { RowBand } from "../types";

/**
 * Splits `height` rows into at most `parts` contiguous bands whose sizes
 * differ by no more than one row. Bands are disjoint and cover every row.
 */
export const partitionRows = (height: number, parts: number): RowBand[] => {
	const count = Math.max(1, Math.min(parts, height));
	const base = Math.floor(height / count);
	const extra = height % count;
	const bands: RowBand[] = [];
	let start = 0;
	for (let i = 0; i < count; i++) {
		const end = start + base + (i < extra ? 1 : 0);
		bands.push({ start, end });
		start = end;
	}
	return bands;
};

/**
 * Runs `writeRow` once per row of each band. Bands are independent tasks: a
 * task only ever receives its own rows of `target`.
 */
export const forEachBand = (
	bands: ReadonlyArray<RowBand>,
	rowOf: (y: number) => Uint8Array,
	writeRow: (out: Uint8Array, y: number) => void,
): void => {
	for (const band of bands) {
		for (let y = band.start; y < band.end; y++) {
			writeRow(rowOf(y), y);
		}
	}
};

/**
 * Source rows read by output rows `band`, given index maps holding `taps`
 * source rows per output row.
 */
export const sourceSpan = (
	band: RowBand,
	taps: number,
	...maps: Int32Array[]
): RowBand => {
	let start = Number.POSITIVE_INFINITY;
	let end = 0;
	for (const map of maps) {
		for (let i = band.start * taps; i < band.end * taps; i++) {
			start = Math.min(start, map[i]);
			end = Math.max(end, map[i] + 1);
		}
	}
	return { start, end };
};
