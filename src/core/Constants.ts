/**
 * Shared constants for the tracing pipeline.
 */

/**
 * Core mathematical and output constants.
 */
export class CoreConstants {
	/** Determinant threshold below which a ray is treated as parallel to a triangle. */
	static readonly PARALLEL_EPSILON = 1e-12;
	static readonly MAX_CHANNEL_VALUE = 255;
}

/**
 * Scene defaults, matching the classic two-sphere demo scene.
 */
export class SceneDefaults {
	static readonly WIDTH = 1280;
	static readonly HEIGHT = 960;
	static readonly FOV = 90;
	static readonly MAX_DEPTH = 5;
	static readonly EPSILON = 0.00001;
	static readonly BACKGROUND_COLOR = Object.freeze({
		r: 0.235294,
		g: 0.67451,
		b: 0.843137,
	});
}

/**
 * Checkerboard pattern used by triangle meshes for their diffuse color.
 */
export class CheckerConstants {
	static readonly SCALE = 5;
	static readonly COLOR_A = Object.freeze({ r: 0.815, g: 0.235, b: 0.031 });
	static readonly COLOR_B = Object.freeze({ r: 0.937, g: 0.937, b: 0.231 });
}
