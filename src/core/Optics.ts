/**
 * Reflection, refraction and Fresnel helpers. All directions point along the
 * direction of travel; normals may face either side of the surface.
 */

import { clamp } from "../maths/Common";
import { Vector3 } from "../maths/Vector3";
import type { IVector3 } from "../maths/types";

/**
 * Mirrors `I` about `N`: `I - 2(I·N)N`.
 */
export function reflect(I: IVector3, N: IVector3): Vector3 {
	return Vector3.addScaled(I, N, -2 * Vector3.dot(I, N));
}

/**
 * Bends `I` through an interface by Snell's law.
 *
 * A ray with `I·N < 0` is entering the medium of index `ior` from a medium of
 * index 1; otherwise it is leaving it, and the indices are swapped and the
 * normal flipped.
 *
 * @returns the transmitted direction (unit length when `I` and `N` are), or
 * null under total internal reflection
 */
export function refract(
	I: IVector3,
	N: IVector3,
	ior: number
): Vector3 | null {
	let cosi = clamp(Vector3.dot(I, N), -1, 1);
	let etai = 1;
	let etat = ior;
	let n = Vector3.from(N);

	if (cosi < 0) {
		cosi = -cosi;
	} else {
		[etai, etat] = [etat, etai];
		n = Vector3.negate(N);
	}

	const eta = etai / etat;
	const k = 1 - eta * eta * (1 - cosi * cosi);
	if (k < 0) return null;

	return Vector3.addScaled(Vector3.scale(I, eta), n, eta * cosi - Math.sqrt(k));
}

/**
 * Fraction of light reflected at the interface, by Schlick's approximation.
 * The transmitted fraction is `1 - fresnel(...)`.
 */
export function fresnel(I: IVector3, N: IVector3, ior: number): number {
	const cosi = Math.abs(clamp(Vector3.dot(I, N), -1, 1));
	const r0 = Math.pow((1 - ior) / (1 + ior), 2);
	return r0 + (1 - r0) * Math.pow(1 - cosi, 5);
}
