import type { IVector3 } from "../maths/types";
import { Material } from "../materials/Material";
import { MeshTriangle } from "./MeshTriangle";

export class ModelFactory {
	/**
	 * Horizontal quad centered on `center`, facing +Y, built from two
	 * triangles. Texture coordinates run from (0, 0) at the +Z/-X corner to
	 * (1, 1) at the -Z/+X corner.
	 */
	public static createPlane(
		center: IVector3,
		width: number,
		depth: number,
		material = new Material()
	): MeshTriangle {
		const w2 = width / 2;
		const d2 = depth / 2;
		const { x, y, z } = center;

		return new MeshTriangle(
			[
				{ x: x - w2, y, z: z + d2 },
				{ x: x + w2, y, z: z + d2 },
				{ x: x + w2, y, z: z - d2 },
				{ x: x - w2, y, z: z - d2 },
			],
			[0, 1, 3, 1, 2, 3],
			[
				{ x: 0, y: 0 },
				{ x: 1, y: 0 },
				{ x: 1, y: 1 },
				{ x: 0, y: 1 },
			],
			material
		);
	}
}
