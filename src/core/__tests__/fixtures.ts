import { Vector2 } from "../../maths/Vector2";
import { Vector3 } from "../../maths/Vector3";
import type { IVector3 } from "../../maths/types";
import { Material } from "../../materials/Material";
import { rgb, type RGB } from "../../utils/Color";
import type { Intersection, SceneObject, SurfaceProperties } from "../types";

export interface StubObjectOptions {
	/** Distance reported for every hit; null never hits. */
	t: number | null;
	material?: Material;
	normal?: IVector3;
	color?: RGB;
	/** Stop reporting hits after this many intersect calls. */
	hitLimit?: number;
}

/**
 * A SceneObject with scripted answers, for testing the tracer in isolation
 * from real geometry.
 */
export class StubObject implements SceneObject {
	public readonly material: Material;
	public intersectCalls = 0;

	private readonly _t: number | null;
	private readonly _normal: IVector3;
	private readonly _color: RGB;
	private readonly _hitLimit: number;

	constructor(options: StubObjectOptions) {
		this._t = options.t;
		this.material = options.material ?? new Material();
		this._normal = options.normal ?? { x: 0, y: 0, z: 1 };
		this._color = options.color ?? rgb(1);
		this._hitLimit = options.hitLimit ?? Infinity;
	}

	public intersect(): Intersection | null {
		this.intersectCalls++;
		if (this._t === null || this.intersectCalls > this._hitLimit) return null;
		return { tNear: this._t, index: 0, uv: { x: 0, y: 0 } };
	}

	public getSurfaceProperties(): SurfaceProperties {
		return { normal: Vector3.from(this._normal), st: new Vector2(0, 0) };
	}

	public evalDiffuseColor(): RGB {
		return this._color;
	}
}
