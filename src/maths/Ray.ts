import { Vector3 } from "./Vector3";
import type { IVector3 } from "./types";

/**
 * A half-line `origin + t · direction`, `t > 0`.
 * The direction is normalized on construction and both members are copies,
 * so a ray never aliases the vectors it was built from.
 */
export class Ray {
	public readonly origin: Vector3;
	public readonly direction: Vector3;

	constructor(origin: IVector3, direction: IVector3) {
		this.origin = Vector3.from(origin);
		this.direction = Vector3.normalize(direction);
	}

	public at(t: number): Vector3 {
		return Vector3.addScaled(this.origin, this.direction, t);
	}
}
