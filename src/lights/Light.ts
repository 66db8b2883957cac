import { scaleColor, type RGB } from "../utils/Color";

export enum LightType {
	Point = "point",
}

export interface LightParams {
	color?: RGB;
	intensity?: number;
}

export abstract class Light<TType extends LightType = LightType> {
	public readonly type: TType;
	public readonly color: RGB;
	public readonly intensity: number;

	protected constructor(type: TType, params: LightParams = {}) {
		this.type = type;
		this.color = params.color ?? { r: 1, g: 1, b: 1 };
		this.intensity = params.intensity ?? 1.0;
	}

	/**
	 * Linear radiance delivered by this light: `color × intensity`.
	 */
	public get radiance(): RGB {
		return scaleColor(this.color, this.intensity);
	}
}
