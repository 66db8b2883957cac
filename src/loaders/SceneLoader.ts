import { dirname, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { Scene } from "../core/Scene";
import { SceneConfigError } from "../core/Errors";
import type { SceneObject } from "../core/types";
import { PointLight } from "../lights";
import { Material } from "../materials/Material";
import { MeshTriangle } from "../models/MeshTriangle";
import { ModelFactory } from "../models/ModelFactory";
import { Sphere } from "../models/Sphere";
import { Loader } from "./Loader";
import { OBJLoader } from "./OBJLoader";
import { sceneSchema, type ObjectDescription } from "./SceneSchema";

function formatIssue(issue: ZodIssue): string {
	const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
	return `${path}: ${issue.message}`;
}

/**
 * Loads a JSON scene description: image settings, objects and lights.
 * Relative `obj` paths are resolved against the scene file's directory.
 */
export class SceneLoader extends Loader<Scene> {
	public async load(path: string): Promise<Scene> {
		try {
			const text = await this._readText(path);

			let json: unknown;
			try {
				json = JSON.parse(text);
			} catch (error) {
				throw new SceneConfigError(`Scene file ${path} is not valid JSON`, [], {
					cause: error,
				});
			}

			const scene = await this._build(json, dirname(path));
			this.emit("load", scene);
			return scene;
		} catch (error) {
			throw this._fail(error);
		}
	}

	/**
	 * Validates an already-decoded description and builds the scene.
	 * Failures are emitted as `error` before they are thrown.
	 */
	public async parse(input: unknown, baseDir = process.cwd()): Promise<Scene> {
		try {
			return await this._build(input, baseDir);
		} catch (error) {
			throw this._fail(error);
		}
	}

	private async _build(input: unknown, baseDir: string): Promise<Scene> {
		this.emit("parsestart");

		const result = sceneSchema.safeParse(input);
		if (!result.success) {
			throw new SceneConfigError(
				"Invalid scene description",
				result.error.issues.map(formatIssue)
			);
		}

		const { settings, objects, lights } = result.data;
		const scene = new Scene(settings);

		for (let i = 0; i < objects.length; i++) {
			scene.addObject(await this._buildObject(objects[i], i, baseDir));
			this.emit("parseprogress", {
				current: i + 1,
				total: objects.length,
				message: `Built object ${i + 1}/${objects.length} (${objects[i].type})`,
			});
		}

		for (const light of lights) {
			scene.addLight(
				new PointLight({
					position: light.position,
					color: light.color,
					intensity: light.intensity,
				})
			);
		}

		return scene;
	}

	private async _buildObject(
		desc: ObjectDescription,
		i: number,
		baseDir: string
	): Promise<SceneObject> {
		const material = new Material(desc.material);

		switch (desc.type) {
			case "sphere":
				return new Sphere(desc.center, desc.radius, material);
			case "plane":
				return ModelFactory.createPlane(
					desc.center,
					desc.width,
					desc.depth,
					material
				);
			case "mesh":
				try {
					return new MeshTriangle(desc.vertices, desc.indices, desc.st, material);
				} catch (error) {
					if (error instanceof RangeError) {
						throw new SceneConfigError("Invalid scene description", [
							`objects.${i}: ${error.message}`,
						]);
					}
					throw error;
				}
			case "obj": {
				const path = resolve(baseDir, desc.path);
				try {
					return await new OBJLoader(material).load(path);
				} catch (error) {
					throw new SceneConfigError(
						`Failed to load mesh for objects.${i} from ${path}`,
						[],
						{ cause: error }
					);
				}
			}
		}
	}
}
