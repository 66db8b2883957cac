import { Vector2 } from "../maths/Vector2";
import { Vector3 } from "../maths/Vector3";
import type { Ray } from "../maths/Ray";
import type { IVector2, IVector3 } from "../maths/types";
import { Material } from "../materials/Material";
import { CheckerConstants, CoreConstants } from "../core/Constants";
import type {
	Intersection,
	SceneObject,
	SurfaceProperties,
} from "../core/types";
import { lerpColor, type RGB } from "../utils/Color";

/**
 * Indexed triangle mesh. Every three entries of `indices` form one triangle;
 * `st` holds one texture coordinate per vertex.
 *
 * The diffuse color is a procedural checkerboard over the texture coordinates.
 */
export class MeshTriangle implements SceneObject {
	public readonly vertices: Vector3[];
	public readonly indices: number[];
	public readonly st: Vector2[];
	public readonly material: Material;

	constructor(
		vertices: IVector3[],
		indices: number[],
		st: IVector2[],
		material = new Material()
	) {
		if (indices.length % 3 !== 0) {
			throw new RangeError(
				`Triangle index count must be a multiple of 3, got ${indices.length}`
			);
		}
		for (const i of indices) {
			if (!Number.isInteger(i) || i < 0 || i >= vertices.length) {
				throw new RangeError(
					`Triangle index ${i} is out of range for ${vertices.length} vertices`
				);
			}
		}
		if (st.length !== vertices.length) {
			throw new RangeError(
				`Expected ${vertices.length} texture coordinates, got ${st.length}`
			);
		}

		this.vertices = vertices.map((v) => Vector3.from(v));
		this.indices = [...indices];
		this.st = st.map((c) => new Vector2(c.x, c.y));
		this.material = material;
	}

	public get triangleCount(): number {
		return this.indices.length / 3;
	}

	/**
	 * Nearest triangle hit across the whole mesh. `uv` carries the barycentric
	 * weights of the second and third vertex.
	 */
	public intersect(ray: Ray): Intersection | null {
		let nearest: Intersection | null = null;

		for (let k = 0; k < this.triangleCount; k++) {
			const [v0, v1, v2] = this._triangle(k);
			const hit = MeshTriangle.intersectTriangle(v0, v1, v2, ray);
			if (hit && (nearest === null || hit.t < nearest.tNear)) {
				nearest = { tNear: hit.t, index: k, uv: { x: hit.u, y: hit.v } };
			}
		}

		return nearest;
	}

	public getSurfaceProperties(
		_hitPoint: IVector3,
		_direction: IVector3,
		index: number,
		uv: IVector2
	): SurfaceProperties {
		const [v0, v1, v2] = this._triangle(index);
		const e0 = Vector3.sub(v1, v0).normalize();
		const e1 = Vector3.sub(v2, v1).normalize();

		const base = index * 3;
		const st0 = this.st[this.indices[base]];
		const st1 = this.st[this.indices[base + 1]];
		const st2 = this.st[this.indices[base + 2]];

		return {
			normal: Vector3.cross(e0, e1).normalize(),
			st: Vector2.barycentric(st0, st1, st2, uv.x, uv.y),
		};
	}

	public evalDiffuseColor(st: IVector2): RGB {
		const scale = CheckerConstants.SCALE;
		const pattern =
			((st.x * scale) % 1 > 0.5) !== ((st.y * scale) % 1 > 0.5) ? 1 : 0;
		return lerpColor(CheckerConstants.COLOR_A, CheckerConstants.COLOR_B, pattern);
	}

	/**
	 * Möller–Trumbore ray/triangle test. Accepts only hits strictly in front
	 * of the ray origin and inside or on the triangle's edges.
	 */
	public static intersectTriangle(
		v0: IVector3,
		v1: IVector3,
		v2: IVector3,
		ray: Ray
	): { t: number; u: number; v: number } | null {
		const E1 = Vector3.sub(v1, v0);
		const E2 = Vector3.sub(v2, v0);
		const S = Vector3.sub(ray.origin, v0);
		const S1 = Vector3.cross(ray.direction, E2);
		const S2 = Vector3.cross(S, E1);

		const det = Vector3.dot(S1, E1);
		if (Math.abs(det) < CoreConstants.PARALLEL_EPSILON) return null;

		const invDet = 1 / det;
		const t = Vector3.dot(S2, E2) * invDet;
		const u = Vector3.dot(S1, S) * invDet;
		const v = Vector3.dot(S2, ray.direction) * invDet;

		if (t > 0 && u >= 0 && v >= 0 && 1 - u - v >= 0) {
			return { t, u, v };
		}
		return null;
	}

	private _triangle(k: number): [Vector3, Vector3, Vector3] {
		const base = k * 3;
		return [
			this.vertices[this.indices[base]],
			this.vertices[this.indices[base + 1]],
			this.vertices[this.indices[base + 2]],
		];
	}
}
