import type { BytesPerPixel, Color } from "../types";

export const isByte = (v: number): boolean =>
	Number.isInteger(v) && v >= 0 && v <= 255;

/** Channel bytes of a color in buffer order: B, G, R and optionally A. */
export const colorToChannels = (
	color: Color,
	bytesPerPixel: BytesPerPixel,
): Uint8Array => {
	const { r, g, b, a = 255 } = color;
	for (const v of [r, g, b, a]) {
		if (!isByte(v)) {
			throw new RangeError(`Color channel out of range: ${v}`);
		}
	}
	return bytesPerPixel === 4
		? Uint8Array.of(b, g, r, a)
		: Uint8Array.of(b, g, r);
};

export const channelsToColor = (channels: ArrayLike<number>): Color =>
	channels.length >= 4
		? { r: channels[2], g: channels[1], b: channels[0], a: channels[3] }
		: { r: channels[2], g: channels[1], b: channels[0] };
