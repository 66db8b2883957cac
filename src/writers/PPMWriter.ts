import { writeFile } from "node:fs/promises";
import { CoreConstants } from "../core/Constants";
import { ImageWriteError } from "../core/Errors";
import type { FrameBuffer } from "../core/FrameBuffer";
import { toByte } from "../utils/Color";

/**
 * Binary PPM (P6) encoder.
 *
 * Layout: `P6\n<width> <height>\n255\n` followed by one RGB byte triple per
 * pixel, rows top to bottom, matching the frame buffer's row order.
 */
export class PPMWriter {
	public static header(width: number, height: number): string {
		return `P6\n${width} ${height}\n${CoreConstants.MAX_CHANNEL_VALUE}\n`;
	}

	public static encode(frame: FrameBuffer): Uint8Array {
		const header = new TextEncoder().encode(
			PPMWriter.header(frame.width, frame.height)
		);
		const pixelCount = frame.width * frame.height;
		const out = new Uint8Array(header.length + pixelCount * 3);
		out.set(header, 0);

		const src = frame.data;
		for (let i = 0; i < pixelCount * 3; i++) {
			out[header.length + i] = toByte(src[i], CoreConstants.MAX_CHANNEL_VALUE);
		}

		return out;
	}

	/**
	 * Encodes and writes `frame` to `path`, replacing any existing file.
	 * @throws {ImageWriteError} when the file cannot be written
	 */
	public static async write(frame: FrameBuffer, path: string): Promise<void> {
		const bytes = PPMWriter.encode(frame);
		try {
			await writeFile(path, bytes);
		} catch (error) {
			throw new ImageWriteError(path, { cause: error });
		}
	}
}
