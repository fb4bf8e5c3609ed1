import { assertBgrFormat } from "../errors";
import type {
	LinearAxis,
	RowKernel,
	RowSource,
	ScalingAlgorithm,
} from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";
import { clampToByte, sampleCenter } from "../utils/pixel-logic";
import { forEachBand, partitionRows } from "../utils/rows";

/**
 * For each output coordinate: the source pixel containing the sample center,
 * its neighbour on the side the center leans toward (capped at the edges),
 * and the weight of the first, `1 - |distance to its center|`.
 */
export const buildLinearAxis = (inSize: number, outSize: number): LinearAxis => {
	const ratio = inSize / outSize;
	const last = inSize - 1;
	const first = new Int32Array(outSize);
	const second = new Int32Array(outSize);
	const weights = new Float32Array(outSize);

	for (let out = 0; out < outSize; out++) {
		const center = sampleCenter(out, ratio);
		const i1 = Math.min(Math.floor(center), last);
		const dist = center - (i1 + 0.5);
		first[out] = i1;
		second[out] = dist <= 0 ? Math.max(i1 - 1, 0) : Math.min(i1 + 1, last);
		weights[out] = 1 - Math.abs(dist);
	}

	return { first, second, weights };
};

export const createBilinearKernel = (
	source: RowSource,
	x: LinearAxis,
	y: LinearAxis,
): RowKernel => {
	const bpp = source.bytesPerPixel;
	const cols1 = x.first.map((i) => i * bpp);
	const cols2 = x.second.map((i) => i * bpp);
	const width = cols1.length;

	return (out, outY) => {
		const row1 = source.row(y.first[outY]);
		const row2 = source.row(y.second[outY]);
		const y1Weight = y.weights[outY];
		const y2Weight = 1 - y1Weight;

		let o = 0;
		for (let outX = 0; outX < width; outX++) {
			const x1Weight = x.weights[outX];
			const x2Weight = 1 - x1Weight;

			const w1 = x1Weight * y1Weight;
			const w2 = x2Weight * y1Weight;
			const w3 = x1Weight * y2Weight;
			const w4 = x2Weight * y2Weight;
			// Collapsed neighbours at the edges still sum to 1 after this.
			const norm = 1 / (w1 + w2 + w3 + w4);

			const c1 = cols1[outX];
			const c2 = cols2[outX];
			for (let c = 0; c < 3; c++) {
				out[o++] = clampToByte(
					(row1[c1 + c] * w1 +
						row1[c2 + c] * w2 +
						row2[c1 + c] * w3 +
						row2[c2 + c] * w4) *
						norm,
				);
			}
		}
	};
};

export const resampleBilinear = (
	source: PixelBuffer,
	targetW: number,
	targetH: number,
	parallelism: number,
): PixelBuffer => {
	assertBgrFormat(source.bytesPerPixel);
	const target = PixelBuffer.create(targetW, targetH, 3);
	const kernel = createBilinearKernel(
		source,
		buildLinearAxis(source.width, targetW),
		buildLinearAxis(source.height, targetH),
	);
	forEachBand(
		partitionRows(targetH, parallelism),
		(y) => target.row(y),
		kernel,
	);
	return target;
};

export const BilinearScaler: ScalingAlgorithm = {
	name: "Bilinear",
	id: "bilinear",
	description:
		"Blends the four source pixels nearest each output center by distance.",
	resample: resampleBilinear,
};
