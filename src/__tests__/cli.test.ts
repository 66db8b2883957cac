import { describe, it, expect } from "vitest";
import { applyOverrides, parseCliArgs } from "../cli";
import { Scene } from "../core/Scene";
import { SceneConfigError } from "../core/Errors";

describe("parseCliArgs", () => {
	it("defaults to binary.ppm without overrides", () => {
		expect(parseCliArgs([])).toEqual({
			output: "binary.ppm",
			shadowSpecular: false,
			help: false,
		});
	});

	it("reads long and short options", () => {
		const options = parseCliArgs([
			"-s",
			"scenes/glass-cube.json",
			"-o",
			"cube.ppm",
			"-w",
			"64",
			"--height",
			"48",
			"-d",
			"2",
			"--shadow-specular",
		]);

		expect(options).toEqual({
			scene: "scenes/glass-cube.json",
			output: "cube.ppm",
			width: 64,
			height: 48,
			maxDepth: 2,
			shadowSpecular: true,
			help: false,
		});
	});

	it("validates numeric overrides", () => {
		expect(() => parseCliArgs(["--width", "0"])).toThrow(SceneConfigError);
		expect(() => parseCliArgs(["--max-depth=-1"])).toThrow(
			"Invalid command-line option:\n  - maxDepth: Number must be greater than or equal to 0"
		);
		expect(() => parseCliArgs(["--height", "abc"])).toThrow(SceneConfigError);
	});

	it("shows usage without validating the other options", () => {
		expect(parseCliArgs(["--help", "--width", "0"])).toEqual({
			output: "binary.ppm",
			shadowSpecular: false,
			help: true,
		});
		expect(parseCliArgs(["-h"]).help).toBe(true);
	});

	it("takes -H as the height", () => {
		expect(parseCliArgs(["-H", "48"]).height).toBe(48);
	});

	it("rejects unknown options", () => {
		expect(() => parseCliArgs(["--samples", "4"])).toThrow();
	});
});

describe("applyOverrides", () => {
	it("replaces only the given settings", () => {
		const scene = new Scene({ width: 100, height: 50, maxDepth: 5 });
		const options = parseCliArgs(["--width", "20", "-d", "1"]);

		expect(applyOverrides(scene, options)).toBe(scene);
		expect(scene.width).toBe(20);
		expect(scene.height).toBe(50);
		expect(scene.maxDepth).toBe(1);
	});
});
