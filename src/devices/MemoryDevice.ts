import { DeviceError } from "../core/Errors";
import type { FrameBuffer } from "../core/FrameBuffer";
import type { OutputDevice } from "../core/types";
import type { RGB } from "../utils/Color";

/**
 * Keeps a copy of every displayed frame. Useful for headless runs and for
 * exercising error handling through failNext().
 */
export class MemoryDevice implements OutputDevice {
	public readonly frames: RGB[][] = [];

	private _pendingFailure: Error | null = null;

	constructor(
		public readonly width: number,
		public readonly height: number
	) {}

	public get lastFrame(): RGB[] | null {
		return this.frames[this.frames.length - 1] ?? null;
	}

	/** Makes the next display() reject with a DeviceError caused by `error`. */
	public failNext(error: Error): void {
		this._pendingFailure = error;
	}

	public async display(frame: FrameBuffer): Promise<void> {
		const failure = this._pendingFailure;
		if (failure) {
			this._pendingFailure = null;
			throw new DeviceError(`MemoryDevice: ${failure.message}`, {
				cause: failure,
			});
		}
		this.frames.push(frame.snapshot());
	}
}
