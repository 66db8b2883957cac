import { d2r } from "../maths/Common";
import { Ray } from "../maths/Ray";
import { Vector3 } from "../maths/Vector3";

/**
 * Pinhole camera fixed at the world origin, looking down -Z with +Y up.
 *
 * Screen space: (0, 0) is the top-left pixel, rows grow downwards and pixel
 * centers sit at +0.5.
 */
export class Camera {
	public readonly position: Vector3 = new Vector3(0, 0, 0);
	/** Vertical field of view in degrees. */
	public fov: number;
	public aspectRatio: number;

	constructor(fov = 90, aspectRatio = 1) {
		this.fov = fov;
		this.aspectRatio = aspectRatio;
	}

	/**
	 * Primary ray through the center of pixel (`row`, `col`) of a
	 * `width × height` image.
	 */
	public generateRay(
		row: number,
		col: number,
		width: number,
		height: number
	): Ray {
		const scale = Math.tan(d2r(this.fov * 0.5));

		// Screen space to NDC, [-1, 1] on both axes
		const ndcX = ((col + 0.5) / width) * 2 - 1;
		const ndcY = ((row + 0.5) / height) * 2 - 1;

		// NDC to the image plane at z = -1; row 0 is the top of the image
		const x = ndcX * scale * this.aspectRatio;
		const y = -ndcY * scale;

		return new Ray(this.position, new Vector3(x, y, -1));
	}
}
