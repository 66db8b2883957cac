import { Ray } from "../maths/Ray";
import { Vector3 } from "../maths/Vector3";
import { trace } from "../core/Tracer";
import { reflect } from "../core/Optics";
import type { Scene } from "../core/Scene";
import type { RGB } from "../utils/Color";
import type { ILightingStrategy, ShadingOptions, SurfaceHit } from "./types";

/**
 * Diffuse plus specular Phong lighting with hard shadows.
 *
 * final = Σ(radiance · max(0, L·N) · visible) · diffuseColor(st) · kd
 *       + Σ(radiance · max(0, -R·D)^n) · ks
 */
export class PhongStrategy implements ILightingStrategy {
	public readonly shadowSpecular: boolean;

	constructor(options: ShadingOptions = {}) {
		this.shadowSpecular = options.shadowSpecular ?? false;
	}

	public calculate(hit: SurfaceHit, scene: Scene): RGB {
		const { object, point, direction, normal: N, st } = hit;
		const material = object.material;

		let diffR = 0,
			diffG = 0,
			diffB = 0;
		let specR = 0,
			specG = 0,
			specB = 0;

		// Shadow rays start on the side the view ray arrived from.
		const shadowOrigin =
			Vector3.dot(direction, N) < 0 ?
				Vector3.addScaled(point, N, scene.epsilon)
			:	Vector3.addScaled(point, N, -scene.epsilon);

		for (const light of scene.lights) {
			const toLight = Vector3.sub(light.position, point);
			const lightDistance2 = toLight.lengthSq();
			const L = toLight.normalize();
			const LdotN = Math.max(0, Vector3.dot(L, N));

			const occluder = trace(new Ray(shadowOrigin, L), scene.objects);
			const inShadow =
				occluder !== null && occluder.tNear * occluder.tNear < lightDistance2;

			const radiance = light.radiance;

			if (!inShadow) {
				diffR += radiance.r * LdotN;
				diffG += radiance.g * LdotN;
				diffB += radiance.b * LdotN;
			} else if (this.shadowSpecular) {
				continue;
			}

			const R = reflect(Vector3.negate(L), N);
			const specFactor = Math.pow(
				Math.max(0, -Vector3.dot(R, direction)),
				material.specularExponent
			);

			specR += radiance.r * specFactor;
			specG += radiance.g * specFactor;
			specB += radiance.b * specFactor;
		}

		const albedo = object.evalDiffuseColor(st);

		return {
			r: diffR * albedo.r * material.kd + specR * material.ks,
			g: diffG * albedo.g * material.kd + specG * material.ks,
			b: diffB * albedo.b * material.kd + specB * material.ks,
		};
	}
}
