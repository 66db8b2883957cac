import { solveQuadratic } from "../maths/Common";
import { Vector2 } from "../maths/Vector2";
import { Vector3 } from "../maths/Vector3";
import type { Ray } from "../maths/Ray";
import type { IVector2, IVector3 } from "../maths/types";
import { Material } from "../materials/Material";
import type {
	Intersection,
	SceneObject,
	SurfaceProperties,
} from "../core/types";
import type { RGB } from "../utils/Color";

export class Sphere implements SceneObject {
	public readonly center: Vector3;
	public readonly radius: number;
	public readonly material: Material;

	private readonly _radius2: number;

	constructor(center: IVector3, radius: number, material = new Material()) {
		if (!(radius > 0)) {
			throw new RangeError(`Sphere radius must be positive, got ${radius}`);
		}
		this.center = Vector3.from(center);
		this.radius = radius;
		this.material = material;
		this._radius2 = radius * radius;
	}

	/**
	 * Nearest positive root of |O + tD - C|² = r². When the ray starts inside
	 * the sphere the near root is negative and the far root is used.
	 */
	public intersect(ray: Ray): Intersection | null {
		const L = Vector3.sub(ray.origin, this.center);
		const a = Vector3.dot(ray.direction, ray.direction);
		const b = 2 * Vector3.dot(ray.direction, L);
		const c = Vector3.dot(L, L) - this._radius2;

		const roots = solveQuadratic(a, b, c);
		if (!roots) return null;

		const t = roots.x0 > 0 ? roots.x0 : roots.x1;
		if (!(t > 0)) return null;

		return { tNear: t, index: 0, uv: { x: 0, y: 0 } };
	}

	public getSurfaceProperties(
		hitPoint: IVector3,
		_direction: IVector3,
		_index: number,
		_uv: IVector2
	): SurfaceProperties {
		return {
			normal: Vector3.sub(hitPoint, this.center).normalize(),
			st: new Vector2(0, 0),
		};
	}

	public evalDiffuseColor(): RGB {
		return this.material.diffuseColor;
	}
}
