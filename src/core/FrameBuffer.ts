import type { RGB } from "../utils/Color";

/**
 * Row-major buffer of linear colors, row 0 at the top of the image.
 */
export class FrameBuffer {
	public readonly width: number;
	public readonly height: number;
	public readonly data: Float64Array;

	constructor(width: number, height: number) {
		if (
			!Number.isInteger(width) ||
			!Number.isInteger(height) ||
			width < 0 ||
			height < 0
		) {
			throw new RangeError(`Invalid frame size ${width}x${height}`);
		}
		this.width = width;
		this.height = height;
		this.data = new Float64Array(width * height * 3);
	}

	public setPixel(row: number, col: number, color: RGB): void {
		const idx = (row * this.width + col) * 3;
		this.data[idx] = color.r;
		this.data[idx + 1] = color.g;
		this.data[idx + 2] = color.b;
	}

	public getPixel(row: number, col: number): RGB {
		const idx = (row * this.width + col) * 3;
		return {
			r: this.data[idx],
			g: this.data[idx + 1],
			b: this.data[idx + 2],
		};
	}
}
