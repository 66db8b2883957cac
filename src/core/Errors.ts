/** Raised when a scene description cannot be parsed or fails validation. */
export class SceneConfigError extends Error {
	constructor(
		message: string,
		public readonly issues: string[] = [],
		options?: ErrorOptions
	) {
		super(
			issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message,
			options
		);
		this.name = "SceneConfigError";
	}
}

/** Raised when the rendered image cannot be written. A render without output is fatal. */
export class ImageWriteError extends Error {
	constructor(
		public readonly path: string,
		options?: ErrorOptions
	) {
		super(`Failed to write image to ${path}`, options);
		this.name = "ImageWriteError";
	}
}
