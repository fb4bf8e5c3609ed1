import { assertBgrFormat } from "../errors";
import type { RowKernel, RowSource, ScalingAlgorithm } from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";
import { sampleCenter } from "../utils/pixel-logic";
import { forEachBand, partitionRows } from "../utils/rows";

/** Source index sampled by each output coordinate along one axis. */
export const buildNearestMap = (inSize: number, outSize: number): Int32Array => {
	const ratio = inSize / outSize;
	const last = inSize - 1;
	const map = new Int32Array(outSize);
	for (let out = 0; out < outSize; out++) {
		// center < inSize by construction; the cap guards float rounding only
		map[out] = Math.min(Math.floor(sampleCenter(out, ratio)), last);
	}
	return map;
};

export const createNearestKernel = (
	source: RowSource,
	columns: Int32Array,
	rows: Int32Array,
): RowKernel => {
	const bpp = source.bytesPerPixel;
	const offsets = columns.map((x) => x * bpp);

	return (out, y) => {
		const inRow = source.row(rows[y]);
		let o = 0;
		for (let i = 0; i < offsets.length; i++) {
			const col = offsets[i];
			out[o++] = inRow[col];
			out[o++] = inRow[col + 1];
			out[o++] = inRow[col + 2];
		}
	};
};

export const resampleNearest = (
	source: PixelBuffer,
	targetW: number,
	targetH: number,
	parallelism: number,
): PixelBuffer => {
	assertBgrFormat(source.bytesPerPixel);
	const target = PixelBuffer.create(targetW, targetH, 3);
	const kernel = createNearestKernel(
		source,
		buildNearestMap(source.width, targetW),
		buildNearestMap(source.height, targetH),
	);
	forEachBand(
		partitionRows(targetH, parallelism),
		(y) => target.row(y),
		kernel,
	);
	return target;
};

export const NearestScaler: ScalingAlgorithm = {
	name: "Nearest",
	id: "nearest",
	description:
		"Copies the source pixel whose area contains each output pixel's center.",
	resample: resampleNearest,
};
