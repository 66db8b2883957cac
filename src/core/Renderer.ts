import { Camera } from "../cameras/Camera";
import { PhongStrategy } from "../shaders/PhongStrategy";
import type { ShadingOptions } from "../shaders/types";
import { EventEmitter } from "./EventEmitter";
import { FrameBuffer } from "./FrameBuffer";
import type { Scene } from "./Scene";
import { castRay } from "./Shading";

export interface RenderProgress {
	/** Rows finished so far. */
	row: number;
	total: number;
}

export interface RendererEvents {
	progress: [RenderProgress];
	done: [FrameBuffer];
}

/**
 * CORE RENDERING CONVENTIONS:
 * - Coordinate System: Right-Handed (X: Right, Y: Up, Z: Towards Viewer)
 * - View Space: Eye at origin, -Z is forward
 * - Screen Space: (0,0) at top-left, (W,H) at bottom-right, pixel centers at +0.5
 * - Frame buffer: linear color, row-major, top row first
 */
export class Renderer extends EventEmitter<RendererEvents> {
	public params: ShadingOptions;

	constructor(params: ShadingOptions = {}) {
		super();
		this.params = { shadowSpecular: params.shadowSpecular ?? false };
	}

	/**
	 * Traces one primary ray per pixel, one row at a time, and returns the
	 * finished frame. Runs to completion synchronously.
	 */
	public render(scene: Scene): FrameBuffer {
		const { width, height } = scene;
		const frame = new FrameBuffer(width, height);
		const camera = new Camera(scene.fov, scene.aspectRatio);
		const lighting = new PhongStrategy(this.params);

		for (let row = 0; row < height; row++) {
			for (let col = 0; col < width; col++) {
				const ray = camera.generateRay(row, col, width, height);
				frame.setPixel(
					row,
					col,
					castRay(ray.origin, ray.direction, scene, 0, lighting)
				);
			}
			this.emit("progress", { row: row + 1, total: height });
		}

		this.emit("done", frame);
		return frame;
	}
}
