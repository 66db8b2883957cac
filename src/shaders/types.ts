import type { IVector2, IVector3 } from "../maths/types";
import type { Scene } from "../core/Scene";
import type { SceneObject } from "../core/types";
import type { RGB } from "../utils/Color";

export interface ShadingOptions {
	/**
	 * Also drop the specular highlight of a light that is occluded.
	 * Off by default: occlusion only removes the diffuse term.
	 */
	shadowSpecular?: boolean;
}

/**
 * Everything local shading needs to know about one surface hit.
 */
export interface SurfaceHit {
	object: SceneObject;
	point: IVector3;
	/** Unit direction of the incoming ray. */
	direction: IVector3;
	normal: IVector3;
	st: IVector2;
}

export interface ILightingStrategy {
	calculate(hit: SurfaceHit, scene: Scene): RGB;
}
