import { parseArgs } from "node:util";
import { SceneConfigError } from "./core/Errors";
import type { Scene } from "./core/Scene";
import { settingsSchema } from "./loaders/SceneSchema";

export const USAGE = `Usage: whitted-tracer [options]

Options:
  -s, --scene <file>      Scene description (JSON)
  -o, --output <file>     Output image (binary PPM)          [binary.ppm]
  -w, --width <px>        Override the scene's image width
  -H, --height <px>       Override the scene's image height
  -d, --max-depth <n>     Override the maximum recursion depth
      --shadow-specular   Drop specular highlights of occluded lights
  -h, --help              Show this message`;

export interface CliOptions {
	scene?: string;
	output: string;
	width?: number;
	height?: number;
	maxDepth?: number;
	shadowSpecular: boolean;
	help: boolean;
}

function toNumber(value: string | undefined): number | undefined {
	return value === undefined ? undefined : Number(value);
}

/**
 * Parses command-line arguments. Numeric overrides are validated against the
 * same rules as the scene file's `settings` block, unless `--help` is given.
 */
export function parseCliArgs(argv: string[]): CliOptions {
	const { values } = parseArgs({
		args: argv,
		strict: true,
		options: {
			scene: { type: "string", short: "s" },
			output: { type: "string", short: "o" },
			width: { type: "string", short: "w" },
			height: { type: "string", short: "H" },
			"max-depth": { type: "string", short: "d" },
			"shadow-specular": { type: "boolean" },
			help: { type: "boolean", short: "h" },
		},
	});

	const output = values.output ?? "binary.ppm";
	const shadowSpecular = values["shadow-specular"] ?? false;

	// Usage wins over everything else on the line.
	if (values.help) {
		return { scene: values.scene, output, shadowSpecular, help: true };
	}

	const overrides = settingsSchema.safeParse({
		width: toNumber(values.width),
		height: toNumber(values.height),
		maxDepth: toNumber(values["max-depth"]),
	});
	if (!overrides.success) {
		throw new SceneConfigError(
			"Invalid command-line option",
			overrides.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		);
	}

	return {
		scene: values.scene,
		output,
		width: overrides.data.width,
		height: overrides.data.height,
		maxDepth: overrides.data.maxDepth,
		shadowSpecular,
		help: false,
	};
}

/** Applies command-line overrides to a loaded scene. */
export function applyOverrides(scene: Scene, options: CliOptions): Scene {
	if (options.width !== undefined) scene.width = options.width;
	if (options.height !== undefined) scene.height = options.height;
	if (options.maxDepth !== undefined) scene.maxDepth = options.maxDepth;
	return scene;
}
