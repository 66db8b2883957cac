import type { IVector2, IVector3 } from "../maths/types";
import type { Ray } from "../maths/Ray";
import type { Vector2 } from "../maths/Vector2";
import type { Vector3 } from "../maths/Vector3";
import type { Material } from "../materials/Material";
import type { RGB } from "../utils/Color";

/**
 * An object's own nearest intersection with a ray.
 */
export interface Intersection {
	/** Distance along the ray; always strictly positive. */
	tNear: number;
	/** Sub-primitive index, e.g. the triangle within a mesh. 0 for single primitives. */
	index: number;
	/** Local parameterization of the hit, e.g. barycentric coordinates. */
	uv: IVector2;
}

/**
 * The closest intersection across a whole object collection.
 */
export interface HitPayload extends Intersection {
	object: SceneObject;
}

export interface SurfaceProperties {
	/** Unit normal at the hit point. */
	normal: Vector3;
	/** Texture coordinates. */
	st: Vector2;
}

/**
 * Anything a ray can hit. Implementations answer geometric and material
 * queries only and keep no per-render state.
 */
export interface SceneObject {
	readonly material: Material;
	intersect(ray: Ray): Intersection | null;
	getSurfaceProperties(
		hitPoint: IVector3,
		direction: IVector3,
		index: number,
		uv: IVector2
	): SurfaceProperties;
	evalDiffuseColor(st: IVector2): RGB;
}
