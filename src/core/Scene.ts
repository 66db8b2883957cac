import type { SceneLight } from "../lights";
import type { RGB } from "../utils/Color";
import { SceneDefaults } from "./Constants";
import type { SceneObject } from "./types";

export interface SceneParams {
	width?: number;
	height?: number;
	/** Vertical field of view in degrees. */
	fov?: number;
	maxDepth?: number;
	/** Offset applied to secondary ray origins along the surface normal. */
	epsilon?: number;
	backgroundColor?: RGB;
}

/**
 * Image settings plus the object and light collections. A renderer only
 * reads a scene; nothing here changes while a frame is being traced.
 */
export class Scene {
	public width: number;
	public height: number;
	public fov: number;
	public maxDepth: number;
	public epsilon: number;
	public backgroundColor: RGB;

	public objects: SceneObject[];
	public lights: SceneLight[];

	constructor(params: SceneParams = {}) {
		this.width = params.width ?? SceneDefaults.WIDTH;
		this.height = params.height ?? SceneDefaults.HEIGHT;
		this.fov = params.fov ?? SceneDefaults.FOV;
		this.maxDepth = params.maxDepth ?? SceneDefaults.MAX_DEPTH;
		this.epsilon = params.epsilon ?? SceneDefaults.EPSILON;
		this.backgroundColor = params.backgroundColor ?? {
			...SceneDefaults.BACKGROUND_COLOR,
		};

		this.objects = [];
		this.lights = [];
	}

	public addObject<T extends SceneObject>(object: T): T {
		this.objects.push(object);
		return object;
	}

	public addLight(light: SceneLight): SceneLight {
		this.lights.push(light);
		return light;
	}

	public get aspectRatio(): number {
		return this.width / this.height;
	}
}
