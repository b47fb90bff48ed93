import { DeviceError } from "../core/Errors";
import { colorToChar, unpackColor } from "../utils/Color";
import type { Writable } from "node:stream";
import type { FrameBuffer } from "../core/FrameBuffer";
import type { OutputDevice } from "../core/types";

/** Cursor home followed by erase-display. */
const ANSI_CLEAR = "\x1b[H\x1b[2J";

export interface TextScreenOptions {
	width: number;
	height: number;
	/** Defaults to process.stdout. */
	stream?: Writable;
	/** Redraw in place by clearing the terminal before every frame. */
	clearScreen?: boolean;
}

/**
 * Renders a frame as bordered text, two columns per cell:
 *
 * ```
 * -------
 * | @   |
 * |   @ |
 * -------
 * ```
 */
export function formatFrame(frame: FrameBuffer): string {
	const bar = "-".repeat(frame.width * 2 + 3);
	const lines = [bar];

	for (let y = 0; y < frame.height; y++) {
		let line = "| ";
		for (let x = 0; x < frame.width; x++) {
			const color = unpackColor(frame.colors[frame.index(x, y)]);
			line += colorToChar(color) + " ";
		}
		lines.push(line + "|");
	}

	lines.push(bar);
	return lines.join("\n") + "\n";
}

/**
 * Output device that prints every frame as text to a writable stream.
 */
export class TextScreen implements OutputDevice {
	public readonly width: number;
	public readonly height: number;

	private readonly _stream: Writable;
	private readonly _clearScreen: boolean;
	private _streamError: Error | null = null;

	constructor(options: TextScreenOptions) {
		this.width = options.width;
		this.height = options.height;
		this._stream = options.stream ?? process.stdout;
		this._clearScreen = options.clearScreen ?? false;

		// Reported through the next display() call.
		this._stream.on("error", (error: Error) => {
			this._streamError = error;
		});
	}

	public display(frame: FrameBuffer): Promise<void> {
		if (frame.width !== this.width || frame.height !== this.height) {
			return Promise.reject(
				new DeviceError(
					`TextScreen: frame is ${frame.width}x${frame.height}, ` +
						`screen is ${this.width}x${this.height}`
				)
			);
		}
		if (this._streamError) {
			return Promise.reject(
				new DeviceError("TextScreen: output stream failed", {
					cause: this._streamError,
				})
			);
		}

		const text = (this._clearScreen ? ANSI_CLEAR : "") + formatFrame(frame);

		return new Promise((resolve, reject) => {
			this._stream.write(text, (error) => {
				if (error) {
					reject(
						new DeviceError("TextScreen: failed to write frame", {
							cause: error,
						})
					);
				} else {
					resolve();
				}
			});
		});
	}
}
