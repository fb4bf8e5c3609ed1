import type { PixelBuffer } from "./utils/pixel-buffer";

// Domain Types
export type InterpolationMode = "nearest" | "bilinear" | "bicubic";

export type BytesPerPixel = 3 | 4;

export interface Size {
	readonly width: number;
	readonly height: number;
}

export interface Rect extends Size {
	readonly x: number;
	readonly y: number;
}

export type Point = Readonly<{ x: number; y: number }>;

export interface Color {
	readonly r: number;
	readonly g: number;
	readonly b: number;
	readonly a?: number;
}

/** Plain, structured-clone friendly form of a PixelBuffer. */
export interface PixelBufferInit {
	readonly width: number;
	readonly height: number;
	readonly stride: number;
	readonly bytesPerPixel: number;
	readonly data: Uint8Array;
}

/** Half-open range of output rows owned by one task. */
export interface RowBand {
	readonly start: number;
	readonly end: number;
}

/**
 * Four taps per output coordinate. `indices` hold source pixel indices along
 * the axis, already capped to the last valid index.
 */
export interface WeightTable {
	readonly indices: Int32Array;
	readonly weights: Float32Array;
}

/** Two taps per output coordinate; `weights` holds the weight of `first`. */
export interface LinearAxis {
	readonly first: Int32Array;
	readonly second: Int32Array;
	readonly weights: Float32Array;
}

/** What a row kernel reads: any image that hands out scanlines by index. */
export interface RowSource {
	readonly bytesPerPixel: number;
	row(y: number): Uint8Array;
}

/** Computes output row `y` into `out`, a view exactly one row long. */
export type RowKernel = (out: Uint8Array, y: number) => void;

export interface ScalingAlgorithm {
	name: string;
	id: InterpolationMode;
	description: string;
	resample: (
		source: PixelBuffer,
		targetW: number,
		targetH: number,
		parallelism: number,
	) => PixelBuffer;
}

export interface BandInput {
	/** The source rows this band reads, full width. */
	readonly source: PixelBufferInit;
	/** Row of the full source that `source` starts at. */
	readonly sourceRow: number;
	readonly band: RowBand;
}

export type BandRequest =
	| (BandInput & {
			readonly kind: "nearest";
			readonly columns: Int32Array;
			readonly rows: Int32Array;
	  })
	| (BandInput & {
			readonly kind: "bilinear";
			readonly x: LinearAxis;
			readonly y: LinearAxis;
	  })
	| (BandInput & {
			readonly kind: "bicubic-horizontal" | "bicubic-vertical";
			readonly table: WeightTable;
	  });

export interface BandResult {
	readonly band: RowBand;
	readonly width: number;
	/** Tightly packed rows, `width * 3` bytes each. */
	readonly data: Uint8Array;
}

export interface ScalerWorkerApi {
	resampleBand(request: BandRequest): BandResult;
}
