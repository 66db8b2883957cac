/**
 * Vector3 class and utility functions
 */

import type { IVector3 } from "./types";

export class Vector3 implements IVector3 {
	constructor(
		public x: number = 0,
		public y: number = 0,
		public z: number = 0
	) {}

	public scale(s: number): this {
		this.x *= s;
		this.y *= s;
		this.z *= s;
		return this;
	}

	public length(): number {
		return Math.hypot(this.x, this.y, this.z);
	}

	public lengthSq(): number {
		return this.x * this.x + this.y * this.y + this.z * this.z;
	}

	/**
	 * Normalizes in place. A zero-length vector is left unchanged, so callers
	 * that can produce one must check before relying on a unit result.
	 */
	public normalize(): this {
		const len = this.length() || 1;
		return this.scale(1 / len);
	}

	// Static methods for functional style
	public static from(v: IVector3): Vector3 {
		return new Vector3(v.x, v.y, v.z);
	}

	public static normalize(v: IVector3): Vector3 {
		return new Vector3(v.x, v.y, v.z).normalize();
	}

	public static dot(a: IVector3, b: IVector3): number {
		return a.x * b.x + a.y * b.y + a.z * b.z;
	}

	public static cross(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(
			a.y * b.z - a.z * b.y,
			a.z * b.x - a.x * b.z,
			a.x * b.y - a.y * b.x
		);
	}

	public static add(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(a.x + b.x, a.y + b.y, a.z + b.z);
	}

	public static sub(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(a.x - b.x, a.y - b.y, a.z - b.z);
	}

	public static scale(v: IVector3, s: number): Vector3 {
		return new Vector3(v.x * s, v.y * s, v.z * s);
	}

	public static negate(v: IVector3): Vector3 {
		return new Vector3(-v.x, -v.y, -v.z);
	}

	/** Adds `v · s` to `a`. */
	public static addScaled(a: IVector3, v: IVector3, s: number): Vector3 {
		return new Vector3(a.x + v.x * s, a.y + v.y * s, a.z + v.z * s);
	}

	public static length(v: IVector3): number {
		return Math.hypot(v.x, v.y, v.z);
	}

	public static lerp(a: IVector3, b: IVector3, t: number): Vector3 {
		return new Vector3(
			a.x + (b.x - a.x) * t,
			a.y + (b.y - a.y) * t,
			a.z + (b.z - a.z) * t
		);
	}
}
