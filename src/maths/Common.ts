/**
 * Common math utilities
 */

import type { QuadraticRoots } from "./types";

export function d2r(d: number): number {
	return (d * Math.PI) / 180;
}

export function clamp(val: number, min = 0, max = 1): number {
	return Math.max(min, Math.min(max, val));
}

/**
 * Solves `a·x² + b·x + c = 0` for real roots.
 *
 * Uses the `q = -0.5·(b ± √disc)` form so that the smaller-magnitude root is
 * not computed by subtracting two nearly equal numbers.
 * Returns null when the discriminant is negative.
 */
export function solveQuadratic(
	a: number,
	b: number,
	c: number
): QuadraticRoots | null {
	const discr = b * b - 4 * a * c;
	if (discr < 0) return null;

	if (discr === 0) {
		const x = (-0.5 * b) / a;
		return { x0: x, x1: x };
	}

	const q = b > 0 ? -0.5 * (b + Math.sqrt(discr)) : -0.5 * (b - Math.sqrt(discr));
	const r0 = q / a;
	const r1 = c / q;

	return r0 > r1 ? { x0: r1, x1: r0 } : { x0: r0, x1: r1 };
}
