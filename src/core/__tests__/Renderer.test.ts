import { resolve } from "node:path";
import { describe, it, expect, vi } from "vitest";
import { Material, MaterialType } from "../../materials/Material";
import { Sphere } from "../../models/Sphere";
import { SceneLoader } from "../../loaders/SceneLoader";
import { PPMWriter } from "../../writers/PPMWriter";
import { rgb } from "../../utils/Color";
import { FrameBuffer } from "../FrameBuffer";
import { Renderer } from "../Renderer";
import { Scene } from "../Scene";
import { SceneDefaults } from "../Constants";

describe("Renderer", () => {
	it("fills an empty scene with the background color", () => {
		const scene = new Scene({ width: 2, height: 2 });

		const frame = new Renderer().render(scene);

		for (let row = 0; row < 2; row++) {
			for (let col = 0; col < 2; col++) {
				expect(frame.getPixel(row, col)).toEqual({
					r: SceneDefaults.BACKGROUND_COLOR.r,
					g: SceneDefaults.BACKGROUND_COLOR.g,
					b: SceneDefaults.BACKGROUND_COLOR.b,
				});
			}
		}

		const bytes = PPMWriter.encode(frame);
		const header = "P6\n2 2\n255\n";
		expect(bytes.length).toBe(header.length + 2 * 2 * 3);
		expect(Array.from(bytes.subarray(header.length))).toEqual([
			59, 172, 214, 59, 172, 214, 59, 172, 214, 59, 172, 214,
		]);
	});

	it("reports progress after every row and the finished frame once", () => {
		const renderer = new Renderer();
		const progress = vi.fn();
		const done = vi.fn();
		renderer.on("progress", progress);
		renderer.on("done", done);

		const frame = renderer.render(new Scene({ width: 3, height: 4 }));

		expect(progress.mock.calls.map(([p]) => p)).toEqual([
			{ row: 1, total: 4 },
			{ row: 2, total: 4 },
			{ row: 3, total: 4 },
			{ row: 4, total: 4 },
		]);
		expect(done).toHaveBeenCalledTimes(1);
		expect(done).toHaveBeenCalledWith(frame);
	});

	it("writes rows top to bottom", () => {
		// A sphere above the view axis shows up only in the upper half
		const scene = new Scene({
			width: 1,
			height: 2,
			fov: 90,
			backgroundColor: rgb(1),
		});
		scene.addObject(
			new Sphere(
				{ x: 0, y: 1, z: -2 },
				0.5,
				new Material({ type: MaterialType.DiffuseAndGlossy })
			)
		);

		const frame = new Renderer().render(scene);

		// No lights: the sphere shades to black, the sky stays white
		expect(frame.getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 0 });
		expect(frame.getPixel(1, 0)).toEqual({ r: 1, g: 1, b: 1 });
	});

	it("renders a mirror sphere against the sky as sky × R0", () => {
		const scene = new Scene({ width: 1, height: 1, backgroundColor: rgb(0.5) });
		scene.addObject(
			new Sphere(
				{ x: 0, y: 0, z: -5 },
				1,
				new Material({ type: MaterialType.Reflection, ior: 1.5 })
			)
		);

		const pixel = new Renderer().render(scene).getPixel(0, 0);

		expect(pixel.r).toBeCloseTo(0.5 * 0.04, 12);
	});

	it("renders the default scene", async () => {
		const scene = await new SceneLoader().load(
			resolve(__dirname, "../../../scenes/default.json")
		);
		scene.width = 16;
		scene.height = 12;

		const frame = new Renderer().render(scene);

		// Top-left looks up and away from every object
		expect(frame.getPixel(0, 0)).toEqual(scene.backgroundColor);

		let hits = 0;
		for (let row = 0; row < frame.height; row++) {
			for (let col = 0; col < frame.width; col++) {
				const p = frame.getPixel(row, col);
				if (
					p.r !== scene.backgroundColor.r ||
					p.g !== scene.backgroundColor.g ||
					p.b !== scene.backgroundColor.b
				) {
					hits++;
				}
			}
		}
		expect(hits).toBeGreaterThan(0);
	});
});

describe("FrameBuffer", () => {
	it("stores pixels row-major", () => {
		const frame = new FrameBuffer(3, 2);
		frame.setPixel(1, 2, { r: 0.1, g: 0.2, b: 0.3 });

		expect(Array.from(frame.data.subarray(15, 18))).toEqual([0.1, 0.2, 0.3]);
		expect(frame.getPixel(1, 2)).toEqual({ r: 0.1, g: 0.2, b: 0.3 });
		expect(frame.getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 0 });
	});

	it("rejects invalid sizes", () => {
		expect(() => new FrameBuffer(-1, 2)).toThrow(RangeError);
		expect(() => new FrameBuffer(2.5, 2)).toThrow(RangeError);
	});
});
