import { setTimeout as delay } from "node:timers/promises";
import { performance } from "node:perf_hooks";
import { EventEmitter } from "./EventEmitter";
import { frameDuration, resolveConfig } from "./Config";
import type { Renderer } from "./Renderer";

export interface FrameInfo {
	/** Zero-based index of the frame. */
	frame: number;
	now: number;
	deltaTime: number;
}

export interface FrameEndInfo extends FrameInfo {
	/** Time spent clearing, drawing and displaying, in ms. */
	elapsed: number;
}

export type StopReason = "aborted" | "completed";

export type FrameLoopEvents = {
	tick: [info: FrameInfo];
	framestart: [info: FrameInfo];
	frameend: [info: FrameEndInfo];
	stop: [reason: StopReason, frames: number];
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type FrameCallback = (renderer: Renderer, info: FrameInfo) => void;

export interface FrameLoopOptions {
	targetFps: number;
	/** Stop after this many frames; runs until aborted when omitted. */
	maxFrames?: number;
	clock?: () => number;
	sleep?: Sleep;
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
	return delay(ms, undefined, { signal });
}

/**
 * Drives clear → draw → display once per frame and sleeps away whatever is
 * left of the frame budget. Cancellation is only observed between frames
 * and while sleeping; a draw callback always runs to completion.
 */
export class FrameLoop extends EventEmitter<FrameLoopEvents> {
	private readonly _renderer: Renderer;
	private readonly _draw: FrameCallback;
	private readonly _budget: number;
	private readonly _maxFrames: number;
	private readonly _clock: () => number;
	private readonly _sleep: Sleep;

	constructor(
		renderer: Renderer,
		draw: FrameCallback,
		options: FrameLoopOptions
	) {
		super();
		this._renderer = renderer;
		this._draw = draw;
		// Same rule as the raster config: a ConfigError for anything but a
		// positive integer rate.
		this._budget = frameDuration(
			resolveConfig({ targetFps: options.targetFps })
		);
		this._maxFrames = options.maxFrames ?? Number.POSITIVE_INFINITY;
		this._clock = options.clock ?? (() => performance.now());
		this._sleep = options.sleep ?? defaultSleep;
	}

	/** Frame budget in ms. */
	public get budget(): number {
		return this._budget;
	}

	/**
	 * Runs until `maxFrames` frames were displayed or `signal` aborts.
	 * Resolves with the number of frames displayed; a device failure
	 * rejects without retrying.
	 */
	public async run(signal?: AbortSignal): Promise<number> {
		let frame = 0;
		let lastTime = this._clock();

		while (frame < this._maxFrames && !signal?.aborted) {
			const now = this._clock();
			const info: FrameInfo = { frame, now, deltaTime: now - lastTime };
			lastTime = now;

			this.emit("tick", info);
			this.emit("framestart", info);

			this._renderer.clear();
			this._draw(this._renderer, info);
			await this._renderer.display();

			const elapsed = this._clock() - now;
			this.emit("frameend", { ...info, elapsed });
			frame++;

			const remaining = this._budget - elapsed;
			if (remaining <= 0 || frame >= this._maxFrames) continue;

			try {
				await this._sleep(remaining, signal);
			} catch (error) {
				if (signal?.aborted) break;
				throw error;
			}
		}

		const reason: StopReason = signal?.aborted ? "aborted" : "completed";
		this.emit("stop", reason, frame);
		return frame;
	}
}
