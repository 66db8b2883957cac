import { readFile } from "node:fs/promises";
import { EventEmitter } from "../core/EventEmitter";

export interface LoadStartEvent {
	path: string;
}
export interface ProgressEvent {
	loaded: number;
	total: number;
	path: string;
}
export interface ParseProgressEvent {
	current: number;
	total: number;
	message: string;
}

export interface LoaderEvents<T> {
	loadstart: [LoadStartEvent];
	progress: [ProgressEvent];
	parsestart: [];
	parseprogress: [ParseProgressEvent];
	load: [T];
	error: [Error];
}

/**
 * Base Loader class that provides event emission capabilities.
 * Emits:
 * - 'loadstart': When reading begins
 * - 'progress': { loaded, total, path } once the file is read
 * - 'parsestart': When parsing begins
 * - 'parseprogress': { current, total, message } during parsing
 * - 'load': When loading and parsing is complete
 * - 'error': When loading or parsing fails, once per failure
 */
export abstract class Loader<T> extends EventEmitter<LoaderEvents<T>> {
	public abstract load(path: string): Promise<T>;

	/**
	 * Internal helper to read a text file and report it.
	 * @protected
	 */
	protected async _readText(path: string): Promise<string> {
		this.emit("loadstart", { path });
		const buffer = await readFile(path);
		this.emit("progress", {
			loaded: buffer.byteLength,
			total: buffer.byteLength,
			path,
		});
		return buffer.toString("utf8");
	}

	/**
	 * Emits `error` for a failed load and returns the error to rethrow.
	 * @protected
	 */
	protected _fail(error: unknown): Error {
		const err = error instanceof Error ? error : new Error(String(error));
		this.emit("error", err);
		return err;
	}
}
