import { transfer } from "comlink";
import {
	createHorizontalKernel,
	createVerticalKernel,
} from "../algorithms/bicubic-scaler";
import { createBilinearKernel } from "../algorithms/bilinear-scaler";
import { createNearestKernel } from "../algorithms/nearest-scaler";
import type {
	BandRequest,
	BandResult,
	RowKernel,
	RowSource,
	ScalerWorkerApi,
} from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";

const outputWidth = (request: BandRequest): number => {
	switch (request.kind) {
		case "nearest":
			return request.columns.length;
		case "bilinear":
			return request.x.first.length;
		case "bicubic-horizontal":
			return request.table.indices.length / 4;
		case "bicubic-vertical":
			return request.source.width;
	}
};

const kernelFor = (request: BandRequest, source: RowSource): RowKernel => {
	switch (request.kind) {
		case "nearest":
			return createNearestKernel(source, request.columns, request.rows);
		case "bilinear":
			return createBilinearKernel(source, request.x, request.y);
		case "bicubic-horizontal":
			return createHorizontalKernel(source, request.table);
		case "bicubic-vertical":
			return createVerticalKernel(source, request.table);
	}
};

const computeBand = (
	request: BandRequest,
): { result: BandResult; buffer: ArrayBuffer } => {
	const rows = PixelBuffer.from(request.source);
	const { band, sourceRow } = request;
	// Maps index the full source; `rows` only holds the part this band reads.
	const source: RowSource = {
		bytesPerPixel: rows.bytesPerPixel,
		row: (y) => rows.row(y - sourceRow),
	};

	const width = outputWidth(request);
	const bandHeight = band.end - band.start;
	const buffer = new ArrayBuffer(width * 3 * bandHeight);
	const out = new PixelBuffer({
		width,
		height: bandHeight,
		stride: width * 3,
		bytesPerPixel: 3,
		data: new Uint8Array(buffer),
	});

	const kernel = kernelFor(request, source);
	for (let y = band.start; y < band.end; y++) {
		kernel(out.row(y - band.start), y);
	}

	return { result: { band, width, data: out.data }, buffer };
};

/**
 * Computes rows `band.start..band.end` of one pass into a buffer owned by
 * this call. The same row kernels back the synchronous scaler, so a band
 * computed here is byte-identical to the rows `scale` would write.
 */
export const resampleBand = (request: BandRequest): BandResult =>
	computeBand(request).result;

export const scalerWorkerApi: ScalerWorkerApi = {
	resampleBand: (request) => {
		const { result, buffer } = computeBand(request);
		return transfer(result, [buffer]);
	},
};
