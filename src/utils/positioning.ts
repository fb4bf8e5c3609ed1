import { ScaleError } from "../errors";
import type { Point, Rect, Size } from "../types";
import { roundHalfEven } from "./pixel-logic";

/**
 * Largest size with the aspect ratio of `size` that fits inside `box`.
 * Dimensions are truncated, so the result may be a pixel short of the box.
 */
export const fitWithinAspect = (size: Size, box: Size): Size => {
	const xRatio = box.width / size.width;
	const yRatio = box.height / size.height;
	const ratio = xRatio < yRatio ? xRatio : yRatio;
	return {
		width: Math.trunc(ratio * size.width),
		height: Math.trunc(ratio * size.height),
	};
};

/**
 * Top-left point that centers `inner` inside subsection `position` of
 * `outer`, split into `subsections` equal-width columns.
 */
export const centerInSubsection = (
	outer: Size,
	inner: Size,
	position: number,
	subsections: number,
): Point => {
	if (subsections < 1) {
		throw new ScaleError("Must have at least one subsection", "INVALID_ARGUMENT");
	}
	if (position < 0 || position >= subsections) {
		throw new ScaleError(
			`Subsection ${position} outside 0..${subsections - 1}`,
			"INVALID_ARGUMENT",
		);
	}

	const subsectionWidth = Math.trunc(outer.width / subsections);
	if (subsectionWidth < inner.width || outer.height < inner.height) {
		throw new ScaleError(
			`${inner.width}x${inner.height} does not fit a ${subsectionWidth}x${outer.height} subsection`,
			"INVALID_ARGUMENT",
		);
	}

	const x = (subsectionWidth - inner.width) / 2 + position * subsectionWidth;
	return { x: roundHalfEven(x), y: 0 };
};

/**
 * Full-height crop, centered horizontally, that becomes `width` wide when
 * scaled to `height` rows. Never wider than `size`.
 */
export const centeredCropRect = (
	size: Size,
	width: number,
	height: number,
): Rect => {
	const ratio = size.height / height;
	const cropWidth = Math.min(Math.trunc(width * ratio), size.width);
	const centerPixel = Math.trunc((size.width - 1) / 2);

	return {
		x: Math.max(centerPixel - Math.trunc(cropWidth / 2), 0),
		y: 0,
		width: cropWidth,
		height: size.height,
	};
};
