import type { Ray } from "../maths/Ray";
import type { HitPayload, SceneObject } from "./types";

/**
 * Finds the closest intersection of `ray` with any object in `objects`.
 *
 * Every object is asked exactly once; there is no spatial acceleration.
 * Distances must be strictly positive to count. On equal distances the object
 * that comes first in `objects` wins, since later hits must be strictly closer
 * to replace it.
 *
 * @returns the nearest hit, or null when the ray escapes the scene
 */
export function trace(
	ray: Ray,
	objects: readonly SceneObject[]
): HitPayload | null {
	let payload: HitPayload | null = null;

	for (const object of objects) {
		const hit = object.intersect(ray);
		if (!hit || !(hit.tNear > 0)) continue;

		if (payload === null || hit.tNear < payload.tNear) {
			payload = {
				tNear: hit.tNear,
				index: hit.index,
				uv: hit.uv,
				object,
			};
		}
	}

	return payload;
}
