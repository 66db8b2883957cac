import type { IVector2, IVector3 } from "../maths/types";
import type { Material } from "../materials/Material";
import { MeshTriangle } from "../models/MeshTriangle";
import { Loader } from "./Loader";

/**
 * OBJLoader parses .obj files into a single MeshTriangle.
 * Only positions (`v`), texture coordinates (`vt`) and faces (`f`) are read;
 * polygons are fan-triangulated and normals are recomputed from the winding.
 */
export class OBJLoader extends Loader<MeshTriangle> {
	constructor(private readonly _material?: Material) {
		super();
	}

	/**
	 * Loads an OBJ file from disk.
	 */
	public async load(path: string): Promise<MeshTriangle> {
		try {
			const text = await this._readText(path);
			const mesh = this._parse(text, path);
			this.emit("load", mesh);
			return mesh;
		} catch (error) {
			throw this._fail(error);
		}
	}

	/**
	 * Parses OBJ text. `source` only labels error messages.
	 */
	public parse(text: string, source = "<inline>"): MeshTriangle {
		try {
			return this._parse(text, source);
		} catch (error) {
			throw this._fail(error);
		}
	}

	private _parse(text: string, source: string): MeshTriangle {
		this.emit("parsestart");
		const positions: IVector3[] = [];
		const uvs: IVector2[] = [];

		// Each distinct v/vt pair becomes one mesh vertex.
		const vertices: IVector3[] = [];
		const st: IVector2[] = [];
		const indices: number[] = [];
		const cornerIndex = new Map<string, number>();

		const resolve = (raw: string, count: number, line: number): number => {
			const n = Number(raw);
			const idx = n < 0 ? count + n : n - 1;
			if (!Number.isInteger(n) || idx < 0 || idx >= count) {
				throw new Error(
					`Invalid OBJ index "${raw}" on line ${line + 1} (${source})`
				);
			}
			return idx;
		};

		// Reads `count` numeric components starting at parts[1]; `fallback`
		// stands in for absent ones after the first.
		const components = (
			parts: string[],
			count: number,
			line: number,
			fallback?: number
		): number[] => {
			const values: number[] = [];
			for (let k = 1; k <= count; k++) {
				const raw = parts[k];
				const value = raw === undefined && k > 1 ? fallback : Number(raw);
				if (value === undefined || !Number.isFinite(value)) {
					throw new Error(
						`Invalid OBJ ${parts[0]} statement "${parts.join(" ")}" on line ${line + 1} (${source})`
					);
				}
				values.push(value);
			}
			return values;
		};

		const lines = text.split("\n");
		const lineCount = lines.length;

		for (let i = 0; i < lineCount; i++) {
			const line = lines[i].trim();
			if (i % 1000 === 0) {
				this.emit("parseprogress", {
					current: i,
					total: lineCount,
					message: `Parsing line ${i}/${lineCount}`,
				});
			}
			if (!line || line.startsWith("#")) continue;

			const parts = line.split(/\s+/);
			const type = parts[0];

			if (type === "v") {
				const [x, y, z] = components(parts, 3, i);
				positions.push({ x, y, z });
			} else if (type === "vt") {
				const [x, y] = components(parts, 2, i, 0);
				uvs.push({ x, y });
			} else if (type === "f") {
				const corners: number[] = [];

				// Each part is v, v/vt, v//vn or v/vt/vn
				for (let j = 1; j < parts.length; j++) {
					const [vRaw, vtRaw] = parts[j].split("/");
					const vIdx = resolve(vRaw, positions.length, i);
					const vtIdx = vtRaw ? resolve(vtRaw, uvs.length, i) : -1;
					const key = `${vIdx}/${vtIdx}`;

					let index = cornerIndex.get(key);
					if (index === undefined) {
						index = vertices.length;
						vertices.push(positions[vIdx]);
						st.push(vtIdx >= 0 ? uvs[vtIdx] : { x: 0, y: 0 });
						cornerIndex.set(key, index);
					}
					corners.push(index);
				}

				for (let j = 1; j + 1 < corners.length; j++) {
					indices.push(corners[0], corners[j], corners[j + 1]);
				}
			}
		}

		return new MeshTriangle(vertices, indices, st, this._material);
	}
}
