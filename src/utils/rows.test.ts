import { describe, expect, it } from "vitest";
import { forEachBand, partitionRows, sourceSpan } from "./rows";

describe("partitionRows", () => {
	it("splits rows into near-equal contiguous bands", () => {
		expect(partitionRows(10, 3)).toEqual([
			{ start: 0, end: 4 },
			{ start: 4, end: 7 },
			{ start: 7, end: 10 },
		]);
	});

	it("never creates more bands than rows", () => {
		expect(partitionRows(2, 5)).toEqual([
			{ start: 0, end: 1 },
			{ start: 1, end: 2 },
		]);
	});

	it("returns a single band for parallelism 1", () => {
		expect(partitionRows(7, 1)).toEqual([{ start: 0, end: 7 }]);
	});
});

describe("forEachBand", () => {
	it("visits every row exactly once with its own view", () => {
		const rows = Array.from({ length: 5 }, () => new Uint8Array(2));
		forEachBand(
			partitionRows(5, 2),
			(y) => rows[y],
			(out, y) => out.fill(y + 1),
		);
		expect(rows.map((row) => Array.from(row))).toEqual([
			[1, 1],
			[2, 2],
			[3, 3],
			[4, 4],
			[5, 5],
		]);
	});
});

describe("sourceSpan", () => {
	it("covers every row a band's maps point at", () => {
		const rows = Int32Array.of(0, 0, 1, 1, 2, 2);
		expect(sourceSpan({ start: 2, end: 5 }, 1, rows)).toEqual({
			start: 1,
			end: 3,
		});
	});

	it("merges several maps", () => {
		const first = Int32Array.of(0, 0, 1, 1);
		const second = Int32Array.of(0, 1, 0, 1);
		expect(sourceSpan({ start: 2, end: 3 }, 1, first, second)).toEqual({
			start: 0,
			end: 2,
		});
	});

	it("reads every tap of a multi-tap table", () => {
		const indices = Int32Array.of(0, 1, 1, 1, 0, 1, 2, 3, 2, 3, 4, 4);
		expect(sourceSpan({ start: 1, end: 3 }, 4, indices)).toEqual({
			start: 0,
			end: 5,
		});
	});
});
