#!/usr/bin/env node
import { resolve } from "node:path";
import { performance } from "node:perf_hooks";
import { applyOverrides, parseCliArgs, USAGE } from "./cli";
import { PPMWriter, Renderer, SceneLoader } from "./index";

const DEFAULT_SCENE = resolve(__dirname, "../scenes/default.json");

async function main(argv: string[]): Promise<void> {
	const options = parseCliArgs(argv);
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const loader = new SceneLoader();
	loader.on("loadstart", ({ path }) => {
		console.log(`[Loading] ${path}`);
	});

	const scene = applyOverrides(
		await loader.load(options.scene ?? DEFAULT_SCENE),
		options
	);
	console.log(
		`[Loading] ${scene.objects.length} objects, ${scene.lights.length} lights`
	);

	const renderer = new Renderer({ shadowSpecular: options.shadowSpecular });

	let lastStep = -1;
	renderer.on("progress", ({ row, total }) => {
		const step = Math.floor((row / total) * 10);
		if (step === lastStep) return;
		lastStep = step;
		console.log(`[Rendering] ${((row / total) * 100).toFixed(1)}%`);
	});

	const start = performance.now();
	const frame = renderer.render(scene);
	const elapsed = performance.now() - start;
	console.log(
		`[Rendering] ${frame.width}x${frame.height} in ${elapsed.toFixed(0)} ms`
	);

	await PPMWriter.write(frame, options.output);
	console.log(`[Output] ${options.output}`);
}

main(process.argv.slice(2)).catch((error) => {
	console.error(
		"Failed to render scene:",
		error instanceof Error ? error.message : error
	);
	process.exitCode = 1;
});
