import { Ray } from "../maths/Ray";
import { Vector3 } from "../maths/Vector3";
import type { IVector3 } from "../maths/types";
import { MaterialType } from "../materials/Material";
import { PhongStrategy } from "../shaders/PhongStrategy";
import type { ILightingStrategy } from "../shaders/types";
import { BLACK, addColors, scaleColor, type RGB } from "../utils/Color";
import { fresnel, reflect, refract } from "./Optics";
import type { Scene } from "./Scene";
import { trace } from "./Tracer";

const defaultLighting = new PhongStrategy();

/**
 * Moves a secondary ray's origin off the surface, onto the side the ray is
 * travelling into.
 */
function offsetOrigin(
	point: IVector3,
	normal: IVector3,
	direction: IVector3,
	epsilon: number
): Vector3 {
	return Vector3.dot(direction, normal) < 0 ?
			Vector3.addScaled(point, normal, -epsilon)
		:	Vector3.addScaled(point, normal, epsilon);
}

/**
 * Radiance arriving at `origin` from `direction`.
 *
 * Recurses into reflected and refracted rays with `depth + 1`; any call with
 * `depth > scene.maxDepth` contributes black. A ray that hits nothing returns
 * the background color.
 */
export function castRay(
	origin: IVector3,
	direction: IVector3,
	scene: Scene,
	depth: number,
	lighting: ILightingStrategy = defaultLighting
): RGB {
	if (depth > scene.maxDepth) {
		return { ...BLACK };
	}

	const ray = new Ray(origin, direction);
	const hit = trace(ray, scene.objects);
	if (!hit) {
		return { ...scene.backgroundColor };
	}

	const dir = ray.direction;
	const hitPoint = ray.at(hit.tNear);
	const { normal: N, st } = hit.object.getSurfaceProperties(
		hitPoint,
		dir,
		hit.index,
		hit.uv
	);
	const material = hit.object.material;

	switch (material.type) {
		case MaterialType.ReflectionAndRefraction: {
			const reflectionDirection = reflect(dir, N).normalize();
			const reflectionColor = castRay(
				offsetOrigin(hitPoint, N, reflectionDirection, scene.epsilon),
				reflectionDirection,
				scene,
				depth + 1,
				lighting
			);

			// Under total internal reflection nothing is transmitted.
			const refracted = refract(dir, N, material.ior);
			let refractionColor: RGB = BLACK;
			if (refracted) {
				const refractionDirection = refracted.normalize();
				refractionColor = castRay(
					offsetOrigin(hitPoint, N, refractionDirection, scene.epsilon),
					refractionDirection,
					scene,
					depth + 1,
					lighting
				);
			}

			const kr = fresnel(dir, N, material.ior);
			return addColors(
				scaleColor(reflectionColor, kr),
				scaleColor(refractionColor, 1 - kr)
			);
		}

		case MaterialType.Reflection: {
			const kr = fresnel(dir, N, material.ior);
			const reflectionDirection = reflect(dir, N).normalize();
			const reflectionColor = castRay(
				offsetOrigin(hitPoint, N, reflectionDirection, scene.epsilon),
				reflectionDirection,
				scene,
				depth + 1,
				lighting
			);
			return scaleColor(reflectionColor, kr);
		}

		default:
			return lighting.calculate(
				{ object: hit.object, point: hitPoint, direction: dir, normal: N, st },
				scene
			);
	}
}
