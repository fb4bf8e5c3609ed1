import { assertBgrFormat } from "../errors";
import type {
	RowKernel,
	RowSource,
	ScalingAlgorithm,
	WeightTable,
} from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";
import { clampToByte, roundHalfEven, sampleCenter } from "../utils/pixel-logic";
import { forEachBand, partitionRows } from "../utils/rows";

export const TAPS = 4;

/** Catmull-Rom cubic (b = 0, c = 0.5). */
export const cubicKernel = (x: number): number => {
	const absX = Math.abs(x);
	const absX2 = absX * absX;
	const absX3 = absX2 * absX;

	if (absX <= 1) {
		return 1.5 * absX3 - 2.5 * absX2 + 1;
	}
	if (absX <= 2) {
		return -0.5 * absX3 + 2.5 * absX2 - 4 * absX + 2;
	}
	return 0;
};

/**
 * Tap indices and normalized weights for every output coordinate of one axis.
 * A tap that repeats the previous index (clamped at the far edge) gets no
 * weight, so an edge pixel is never counted twice.
 */
export const buildWeightTable = (
	inSize: number,
	outSize: number,
): WeightTable => {
	const ratio = inSize / outSize;
	const last = inSize - 1;
	const indices = new Int32Array(outSize * TAPS);
	const weights = new Float32Array(outSize * TAPS);
	const w = new Float64Array(TAPS);

	for (let out = 0; out < outSize; out++) {
		const center = sampleCenter(out, ratio);
		const base = out * TAPS;
		const i1 = Math.min(roundHalfEven(Math.max(center - 2, 0)), last);

		let sum = 0;
		for (let t = 0; t < TAPS; t++) {
			const index = Math.min(i1 + t, last);
			indices[base + t] = index;
			w[t] =
				t > 0 && index === indices[base + t - 1]
					? 0
					: cubicKernel(index + 0.5 - center);
			sum += w[t];
		}

		if (sum === 0) {
			w.fill(0);
			w[0] = 1;
			sum = 1;
		}

		const norm = 1 / sum;
		for (let t = 0; t < TAPS; t++) {
			weights[base + t] = w[t] * norm;
		}
	}

	return { indices, weights };
};

/** Row kernel for the horizontal pass: each output row reads one source row. */
export const createHorizontalKernel = (
	source: RowSource,
	table: WeightTable,
): RowKernel => {
	const bpp = source.bytesPerPixel;
	const cols = table.indices.map((i) => i * bpp);
	const { weights } = table;

	return (out, y) => {
		const inRow = source.row(y);
		let o = 0;
		for (let p = 0; p < cols.length; p += TAPS) {
			const c1 = cols[p];
			const c2 = cols[p + 1];
			const c3 = cols[p + 2];
			const c4 = cols[p + 3];
			const w1 = weights[p];
			const w2 = weights[p + 1];
			const w3 = weights[p + 2];
			const w4 = weights[p + 3];
			for (let c = 0; c < 3; c++) {
				out[o++] = clampToByte(
					inRow[c1 + c] * w1 +
						inRow[c2 + c] * w2 +
						inRow[c3 + c] * w3 +
						inRow[c4 + c] * w4,
				);
			}
		}
	};
};

/** Row kernel for the vertical pass: each output row blends four source rows. */
export const createVerticalKernel = (
	source: RowSource,
	table: WeightTable,
): RowKernel => {
	const { indices, weights } = table;

	return (out, y) => {
		const base = y * TAPS;
		const row1 = source.row(indices[base]);
		const row2 = source.row(indices[base + 1]);
		const row3 = source.row(indices[base + 2]);
		const row4 = source.row(indices[base + 3]);
		const w1 = weights[base];
		const w2 = weights[base + 1];
		const w3 = weights[base + 2];
		const w4 = weights[base + 3];
		for (let i = 0; i < out.length; i++) {
			out[i] = clampToByte(
				row1[i] * w1 + row2[i] * w2 + row3[i] * w3 + row4[i] * w4,
			);
		}
	};
};

/** Resamples every row to `targetW`. Returns `source` itself when the width already matches. */
export const bicubicHorizontalPass = (
	source: PixelBuffer,
	targetW: number,
	parallelism: number,
): PixelBuffer => {
	assertBgrFormat(source.bytesPerPixel);
	if (source.width === targetW) return source;

	const target = PixelBuffer.create(targetW, source.height, 3);
	const kernel = createHorizontalKernel(
		source,
		buildWeightTable(source.width, targetW),
	);
	forEachBand(
		partitionRows(source.height, parallelism),
		(y) => target.row(y),
		kernel,
	);
	return target;
};

/** Resamples every column to `targetH`. Returns `source` itself when the height already matches. */
export const bicubicVerticalPass = (
	source: PixelBuffer,
	targetH: number,
	parallelism: number,
): PixelBuffer => {
	assertBgrFormat(source.bytesPerPixel);
	if (source.height === targetH) return source;

	const target = PixelBuffer.create(source.width, targetH, 3);
	const kernel = createVerticalKernel(
		source,
		buildWeightTable(source.height, targetH),
	);
	forEachBand(
		partitionRows(targetH, parallelism),
		(y) => target.row(y),
		kernel,
	);
	return target;
};

export const resampleBicubic = (
	source: PixelBuffer,
	targetW: number,
	targetH: number,
	parallelism: number,
): PixelBuffer => {
	const horizontal = bicubicHorizontalPass(source, targetW, parallelism);
	const result = bicubicVerticalPass(horizontal, targetH, parallelism);
	return result === source ? source.clone() : result;
};

export const BicubicScaler: ScalingAlgorithm = {
	name: "Bicubic",
	id: "bicubic",
	description:
		"Separable Catmull-Rom convolution: a horizontal pass, then a vertical pass over its result.",
	resample: resampleBicubic,
};
