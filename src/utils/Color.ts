/**
 * Linear RGB color utilities.
 *
 * Channels are linear radiance values: 0 is black, 1 is the brightest value
 * an 8-bit output can hold, and intermediate sums may exceed 1 until they
 * are quantized by {@link toByte}.
 */

import { clamp } from "../maths/Common";

export interface RGB {
	r: number;
	g: number;
	b: number;
}

export const BLACK: Readonly<RGB> = Object.freeze({ r: 0, g: 0, b: 0 });

export function rgb(r: number, g: number = r, b: number = r): RGB {
	return { r, g, b };
}

export function addColors(a: RGB, b: RGB): RGB {
	return { r: a.r + b.r, g: a.g + b.g, b: a.b + b.b };
}

export function scaleColor(c: RGB, s: number): RGB {
	return { r: c.r * s, g: c.g * s, b: c.b * s };
}

export function lerpColor(a: RGB, b: RGB, t: number): RGB {
	return {
		r: a.r + (b.r - a.r) * t,
		g: a.g + (b.g - a.g) * t,
		b: a.b + (b.b - a.b) * t,
	};
}

/**
 * Quantizes a linear channel to [0, 255]. Values are clamped to [0, 1] and
 * truncated, not rounded.
 */
export function toByte(channel: number, maxValue = 255): number {
	return Math.floor(maxValue * clamp(channel, 0, 1));
}
