import { Vector3 } from "../maths/Vector3";
import type { IVector3 } from "../maths/types";
import { Light, LightType, type LightParams } from "./Light";

export interface PointLightParams extends LightParams {
	position?: IVector3;
}

/**
 * An infinitesimal light with no distance falloff.
 */
export class PointLight extends Light<LightType.Point> {
	public readonly position: Vector3;

	constructor(params: PointLightParams = {}) {
		super(LightType.Point, params);
		this.position = Vector3.from(params.position ?? { x: 0, y: 0, z: 0 });
	}
}
