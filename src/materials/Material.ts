import { rgb, type RGB } from "../utils/Color";

/**
 * How a surface responds to an incoming ray.
 * - `DiffuseAndGlossy`: local Phong shading with shadow rays.
 * - `Reflection`: a single mirror ray weighted by the Fresnel term.
 * - `ReflectionAndRefraction`: mirror and transmitted rays blended by the Fresnel term.
 */
export enum MaterialType {
	DiffuseAndGlossy = "diffuseAndGlossy",
	Reflection = "reflection",
	ReflectionAndRefraction = "reflectionAndRefraction",
}

export interface MaterialParams {
	type?: MaterialType;
	ior?: number;
	kd?: number;
	ks?: number;
	diffuseColor?: RGB;
	specularExponent?: number;
}

export class Material {
	public readonly type: MaterialType;
	/** Index of refraction; only read by refractive and reflective surfaces. */
	public readonly ior: number;
	public readonly kd: number;
	public readonly ks: number;
	public readonly diffuseColor: RGB;
	public readonly specularExponent: number;

	constructor(params: MaterialParams = {}) {
		this.type = params.type ?? MaterialType.DiffuseAndGlossy;
		this.ior = params.ior ?? 1.3;
		this.kd = params.kd ?? 0.8;
		this.ks = params.ks ?? 0.2;
		this.diffuseColor = params.diffuseColor ?? rgb(0.2);
		this.specularExponent = params.specularExponent ?? 25;
	}
}
