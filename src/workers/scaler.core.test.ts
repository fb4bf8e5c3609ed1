import { describe, expect, it } from "vitest";
import {
	bicubicHorizontalPass,
	buildWeightTable,
	resampleBicubic,
} from "../algorithms/bicubic-scaler";
import { buildLinearAxis, resampleBilinear } from "../algorithms/bilinear-scaler";
import { buildNearestMap, resampleNearest } from "../algorithms/nearest-scaler";
import type { BandResult } from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";
import { resampleBand } from "./scaler.core";

const pattern = (width: number, height: number): PixelBuffer => {
	const buffer = PixelBuffer.create(width, height, 3, { rowAlignment: 4 });
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			buffer.set(x, y, [(x * 29 + y * 7) % 256, (y * 61) % 256, x * 5]);
		}
	}
	return buffer;
};

const expectRows = (result: BandResult, expected: PixelBuffer): void => {
	const rowBytes = result.width * 3;
	expect(result.data.length).toBe(
		rowBytes * (result.band.end - result.band.start),
	);
	for (let y = result.band.start; y < result.band.end; y++) {
		const offset = (y - result.band.start) * rowBytes;
		expect(Array.from(result.data.subarray(offset, offset + rowBytes))).toEqual(
			Array.from(expected.row(y)),
		);
	}
};

describe("resampleBand", () => {
	const source = pattern(6, 5);
	const band = { start: 2, end: 5 };

	it("computes nearest rows", () => {
		const result = resampleBand({
			kind: "nearest",
			source: source.toInit(),
			sourceRow: 0,
			columns: buildNearestMap(6, 11),
			rows: buildNearestMap(5, 7),
			band,
		});
		expect(result.width).toBe(11);
		expectRows(result, resampleNearest(source, 11, 7, 1));
	});

	it("computes bilinear rows", () => {
		const result = resampleBand({
			kind: "bilinear",
			source: source.toInit(),
			sourceRow: 0,
			x: buildLinearAxis(6, 4),
			y: buildLinearAxis(5, 9),
			band,
		});
		expect(result.width).toBe(4);
		expectRows(result, resampleBilinear(source, 4, 9, 1));
	});

	it("computes both bicubic passes", () => {
		const horizontal = resampleBand({
			kind: "bicubic-horizontal",
			source: source.toInit(),
			sourceRow: 0,
			table: buildWeightTable(6, 10),
			band,
		});
		const intermediate = bicubicHorizontalPass(source, 10, 1);
		expect(horizontal.width).toBe(10);
		expectRows(horizontal, intermediate);

		const vertical = resampleBand({
			kind: "bicubic-vertical",
			source: intermediate.toInit(),
			sourceRow: 0,
			table: buildWeightTable(5, 8),
			band: { start: 0, end: 8 },
		});
		expect(vertical.width).toBe(10);
		expectRows(vertical, resampleBicubic(source, 10, 8, 1));
	});

	it("reads from a slice of the source rows", () => {
		const rows = buildNearestMap(5, 7);
		// Output rows 2..4 read source rows 1..3 only.
		expect(Array.from(rows.subarray(2, 5))).toEqual([1, 2, 3]);
		const slice = source.crop({ x: 0, y: 1, width: 6, height: 3 });

		const result = resampleBand({
			kind: "nearest",
			source: slice.toInit(),
			sourceRow: 1,
			columns: buildNearestMap(6, 11),
			rows,
			band,
		});
		expectRows(result, resampleNearest(source, 11, 7, 1));
	});
});
