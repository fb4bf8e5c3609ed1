import { describe, expect, it } from "vitest";
import { isScaleError } from "../errors";
import { PixelBuffer } from "../utils/pixel-buffer";
import { buildLinearAxis, resampleBilinear } from "./bilinear-scaler";

describe("buildLinearAxis", () => {
	it("pairs each sample with the neighbour its center leans toward", () => {
		const axis = buildLinearAxis(2, 4);
		expect(Array.from(axis.first)).toEqual([0, 0, 1, 1]);
		expect(Array.from(axis.second)).toEqual([0, 1, 0, 1]);
		expect(Array.from(axis.weights)).toEqual([0.75, 0.75, 0.75, 0.75]);
	});

	it("gives full weight to a sample on a pixel center", () => {
		const axis = buildLinearAxis(3, 3);
		expect(Array.from(axis.first)).toEqual([0, 1, 2]);
		expect(Array.from(axis.second)).toEqual([0, 0, 1]);
		expect(Array.from(axis.weights)).toEqual([1, 1, 1]);
	});
});

describe("resampleBilinear", () => {
	it("interpolates between horizontal neighbours", () => {
		const source = PixelBuffer.create(2, 1);
		source.set(1, 0, [200, 0, 0]);

		const out = resampleBilinear(source, 4, 1, 1);
		const blue = [0, 1, 2, 3].map((x) => out.get(x, 0)[0]);
		expect(blue).toEqual([0, 50, 150, 200]);
	});

	it("averages a 2x2 block into one pixel", () => {
		const source = PixelBuffer.create(2, 2);
		source.set(0, 0, [10, 20, 30]);
		source.set(1, 0, [50, 60, 70]);
		source.set(0, 1, [90, 100, 110]);
		source.set(1, 1, [130, 140, 150]);

		const out = resampleBilinear(source, 1, 1, 1);
		expect(Array.from(out.get(0, 0))).toEqual([70, 80, 90]);
	});

	it("keeps a solid color solid", () => {
		const source = PixelBuffer.filled(3, 2, { r: 200, g: 100, b: 17 });
		const out = resampleBilinear(source, 8, 5, 2);
		expect(out.equals(PixelBuffer.filled(8, 5, { r: 200, g: 100, b: 17 }))).toBe(
			true,
		);
	});

	it("refuses 4-byte sources", () => {
		const bgra = PixelBuffer.filled(2, 2, { r: 1, g: 2, b: 3 }, 4);
		let caught: unknown;
		try {
			resampleBilinear(bgra, 3, 5, 1);
		} catch (error) {
			caught = error;
		}
		expect(isScaleError(caught, "INVALID_FORMAT")).toBe(true);
	});
});
