/**
 * Vector2 class and utility functions
 */

import type { IVector2 } from "./types";

export class Vector2 implements IVector2 {
	constructor(
		public x: number = 0,
		public y: number = 0
	) {}

	/**
	 * Barycentric blend `a·(1 - u - v) + b·u + c·v`.
	 */
	public static barycentric(
		a: IVector2,
		b: IVector2,
		c: IVector2,
		u: number,
		v: number
	): Vector2 {
		const w = 1 - u - v;
		return new Vector2(
			a.x * w + b.x * u + c.x * v,
			a.y * w + b.y * u + c.y * v
		);
	}
}
