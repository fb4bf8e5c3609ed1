import { ScaleError, assertPositiveInteger } from "../errors";
import type { BytesPerPixel, Color, PixelBufferInit, Rect } from "../types";
import { colorToChannels } from "./color-utils";

export interface CreateOptions {
	/** Pad every row up to a multiple of this many bytes. */
	rowAlignment?: number;
}

const isBytesPerPixel = (v: number): v is BytesPerPixel => v === 3 || v === 4;

const alignedStride = (rowBytes: number, alignment: number): number =>
	Math.ceil(rowBytes / alignment) * alignment;

/**
 * One packed, row-major image: B,G,R(,A) channels, `stride` bytes per row.
 * Rows may carry padding past `width * bytesPerPixel`; it is never read as
 * pixel data.
 */
export class PixelBuffer {
	readonly width: number;
	readonly height: number;
	readonly stride: number;
	readonly bytesPerPixel: BytesPerPixel;
	readonly data: Uint8Array;

	constructor(init: PixelBufferInit) {
		const { width, height, stride, bytesPerPixel, data } = init;
		if (!isBytesPerPixel(bytesPerPixel)) {
			throw new ScaleError(
				`Unsupported pixel format: ${bytesPerPixel} bytes per pixel (expected 3 or 4)`,
				"UNSUPPORTED_FORMAT",
			);
		}
		assertPositiveInteger(width, "width");
		assertPositiveInteger(height, "height");
		if (!Number.isInteger(stride) || stride < width * bytesPerPixel) {
			throw new ScaleError(
				`stride ${stride} is smaller than a ${width}px row (${width * bytesPerPixel} bytes)`,
				"INVALID_ARGUMENT",
			);
		}
		if (data.length < height * stride) {
			throw new ScaleError(
				`data holds ${data.length} bytes, ${height * stride} required`,
				"INVALID_ARGUMENT",
			);
		}

		this.width = width;
		this.height = height;
		this.stride = stride;
		this.bytesPerPixel = bytesPerPixel;
		this.data = data;
	}

	static create(
		width: number,
		height: number,
		bytesPerPixel: number = 3,
		options: CreateOptions = {},
	): PixelBuffer {
		if (!isBytesPerPixel(bytesPerPixel)) {
			throw new ScaleError(
				`Unsupported pixel format: ${bytesPerPixel} bytes per pixel (expected 3 or 4)`,
				"UNSUPPORTED_FORMAT",
			);
		}
		assertPositiveInteger(width, "width");
		assertPositiveInteger(height, "height");
		const alignment = options.rowAlignment ?? 1;
		assertPositiveInteger(alignment, "rowAlignment");

		const stride = alignedStride(width * bytesPerPixel, alignment);
		return new PixelBuffer({
			width,
			height,
			stride,
			bytesPerPixel,
			data: new Uint8Array(stride * height),
		});
	}

	static filled(
		width: number,
		height: number,
		color: Color,
		bytesPerPixel: number = 3,
		options: CreateOptions = {},
	): PixelBuffer {
		const buffer = PixelBuffer.create(width, height, bytesPerPixel, options);
		const channels = colorToChannels(color, buffer.bytesPerPixel);
		const first = buffer.row(0);
		for (let x = 0; x < width; x++) {
			first.set(channels, x * buffer.bytesPerPixel);
		}
		for (let y = 1; y < height; y++) {
			buffer.row(y).set(first);
		}
		return buffer;
	}

	static from(init: PixelBufferInit): PixelBuffer {
		return init instanceof PixelBuffer ? init : new PixelBuffer(init);
	}

	/** Bytes of pixel data per row, padding excluded. */
	get rowBytes(): number {
		return this.width * this.bytesPerPixel;
	}

	/** A view of scanline `y`, exactly `rowBytes` long. */
	row(y: number): Uint8Array {
		if (!Number.isInteger(y) || y < 0 || y >= this.height) {
			throw new RangeError(`Row ${y} outside 0..${this.height - 1}`);
		}
		const offset = y * this.stride;
		return this.data.subarray(offset, offset + this.rowBytes);
	}

	get(x: number, y: number): Uint8Array {
		const offset = this.pixelOffset(x, y);
		return this.data.slice(offset, offset + this.bytesPerPixel);
	}

	set(x: number, y: number, channels: ArrayLike<number>): void {
		if (channels.length !== this.bytesPerPixel) {
			throw new RangeError(
				`Expected ${this.bytesPerPixel} channels, got ${channels.length}`,
			);
		}
		this.data.set(channels, this.pixelOffset(x, y));
	}

	clone(): PixelBuffer {
		return new PixelBuffer({
			width: this.width,
			height: this.height,
			stride: this.stride,
			bytesPerPixel: this.bytesPerPixel,
			data: this.data.slice(0, this.height * this.stride),
		});
	}

	/** Copies `rect` into a new, tightly packed buffer of the same format. */
	crop(rect: Rect): PixelBuffer {
		const { x, y, width, height } = rect;
		if (
			!Number.isInteger(x) ||
			!Number.isInteger(y) ||
			x < 0 ||
			y < 0 ||
			x + width > this.width ||
			y + height > this.height
		) {
			throw new ScaleError(
				`Crop ${width}x${height}+${x}+${y} outside ${this.width}x${this.height}`,
				"INVALID_ARGUMENT",
			);
		}
		const out = PixelBuffer.create(width, height, this.bytesPerPixel);
		const from = x * this.bytesPerPixel;
		for (let row = 0; row < height; row++) {
			out.row(row).set(this.row(y + row).subarray(from, from + out.rowBytes));
		}
		return out;
	}

	/** Swaps rows and columns: pixel (x, y) lands at (y, x). */
	transpose(): PixelBuffer {
		const bpp = this.bytesPerPixel;
		const out = PixelBuffer.create(this.height, this.width, bpp);
		for (let outY = 0; outY < out.height; outY++) {
			const dest = out.row(outY);
			const col = outY * bpp;
			for (let outX = 0; outX < out.width; outX++) {
				dest.set(this.row(outX).subarray(col, col + bpp), outX * bpp);
			}
		}
		return out;
	}

	/** Pixel-wise comparison; row padding is ignored. */
	equals(other: PixelBuffer): boolean {
		if (
			this.width !== other.width ||
			this.height !== other.height ||
			this.bytesPerPixel !== other.bytesPerPixel
		) {
			return false;
		}
		for (let y = 0; y < this.height; y++) {
			const a = this.row(y);
			const b = other.row(y);
			for (let i = 0; i < a.length; i++) {
				if (a[i] !== b[i]) return false;
			}
		}
		return true;
	}

	toInit(): PixelBufferInit {
		return {
			width: this.width,
			height: this.height,
			stride: this.stride,
			bytesPerPixel: this.bytesPerPixel,
			data: this.data,
		};
	}

	private pixelOffset(x: number, y: number): number {
		if (
			!Number.isInteger(x) ||
			!Number.isInteger(y) ||
			x < 0 ||
			y < 0 ||
			x >= this.width ||
			y >= this.height
		) {
			throw new RangeError(
				`Pixel (${x}, ${y}) outside ${this.width}x${this.height}`,
			);
		}
		return y * this.stride + x * this.bytesPerPixel;
	}
}
