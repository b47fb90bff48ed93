import { RenderConstants } from "./Constants";
import { lerp, progress } from "../maths/Common";
import { Colors, packColor, unpackColor, type RGB } from "../utils/Color";

/**
 * Render target for one frame: one packed color and one depth per cell.
 *
 * CONVENTIONS:
 * - Row-major storage, index = y * width + x
 * - Depth: larger is nearer; -Infinity marks an empty cell
 * - Fractional coordinates are floored to the cell that contains them
 * - Writes outside [0, width) × [0, height) are silently dropped
 */
export class FrameBuffer {
	public readonly width: number;
	public readonly height: number;

	/** Packed 0xRRGGBB per cell. */
	public readonly colors: Uint32Array;
	public readonly depths: Float64Array;

	public readonly background: RGB;

	/**
	 * When enabled, a write only lands if its depth is at least the stored
	 * one. Off by default: the last write wins.
	 */
	public depthTest: boolean;

	private readonly _backgroundPacked: number;

	constructor(width: number, height: number, background: RGB = Colors.BLACK) {
		if (!Number.isInteger(width) || !Number.isInteger(height)) {
			throw new RangeError(
				`FrameBuffer: size must be integral, got ${width}x${height}`
			);
		}
		if (width <= 0 || height <= 0) {
			throw new RangeError(
				`FrameBuffer: size must be positive, got ${width}x${height}`
			);
		}

		this.width = width;
		this.height = height;
		this.background = { ...background };
		this.depthTest = false;
		this._backgroundPacked = packColor(background);

		this.colors = new Uint32Array(width * height);
		this.depths = new Float64Array(width * height);
		this.clear();
	}

	public get size(): number {
		return this.width * this.height;
	}

	public index(x: number, y: number): number {
		return y * this.width + x;
	}

	public inBounds(x: number, y: number): boolean {
		return x >= 0 && y >= 0 && x < this.width && y < this.height;
	}

	public setPixel(x: number, y: number, depth: number, color: RGB): void {
		x = Math.floor(x);
		y = Math.floor(y);
		if (!this.inBounds(x, y)) return;
		this.setPixelUnchecked(x, y, depth, color);
	}

	/**
	 * Writes without a bounds check; the caller guarantees (x, y) is an
	 * integer cell inside the buffer.
	 */
	public setPixelUnchecked(
		x: number,
		y: number,
		depth: number,
		color: RGB
	): void {
		const index = y * this.width + x;
		if (this.depthTest && depth < this.depths[index]) return;
		this.depths[index] = depth;
		this.colors[index] = packColor(color);
	}

	/**
	 * Fills the horizontal span [x1, x2] on row y, interpolating depth from
	 * d1 at x1 to d2 at x2. Coordinates are floored and the span is clamped
	 * to the buffer.
	 */
	public setRow(
		x1: number,
		x2: number,
		y: number,
		d1: number,
		d2: number,
		color: RGB
	): void {
		x1 = Math.floor(x1);
		x2 = Math.floor(x2);
		y = Math.floor(y);
		if (x1 > x2) {
			[x1, x2] = [x2, x1];
			[d1, d2] = [d2, d1];
		}
		if (y < 0 || y >= this.height) return;
		if (x2 < 0 || x1 >= this.width) return;

		const start = Math.max(0, x1);
		const end = Math.min(this.width - 1, x2);

		for (let x = start; x <= end; x++) {
			const depth = lerp(d1, d2, progress(x, x1, x2));
			this.setPixelUnchecked(x, y, depth, color);
		}
	}

	/** Overwrites every color; depths are left as they are. */
	public setAllPixels(color: RGB): void {
		this.colors.fill(packColor(color));
	}

	public clear(): void {
		this.colors.fill(this._backgroundPacked);
		this.depths.fill(RenderConstants.CLEAR_DEPTH);
	}

	public getPixel(x: number, y: number): RGB | null {
		x = Math.floor(x);
		y = Math.floor(y);
		if (!this.inBounds(x, y)) return null;
		return unpackColor(this.colors[this.index(x, y)]);
	}

	public getDepth(x: number, y: number): number | null {
		x = Math.floor(x);
		y = Math.floor(y);
		if (!this.inBounds(x, y)) return null;
		return this.depths[this.index(x, y)];
	}

	/**
	 * Number of cells whose color differs from the background.
	 */
	public countDrawn(): number {
		let count = 0;
		for (let i = 0; i < this.colors.length; i++) {
			if (this.colors[i] !== this._backgroundPacked) count++;
		}
		return count;
	}

	/** Coordinates of every cell whose color differs from the background. */
	public drawnPixels(): Array<[number, number]> {
		const out: Array<[number, number]> = [];
		for (let y = 0; y < this.height; y++) {
			for (let x = 0; x < this.width; x++) {
				if (this.colors[y * this.width + x] !== this._backgroundPacked) {
					out.push([x, y]);
				}
			}
		}
		return out;
	}

	/** Row-major copy of the color grid, one RGB per cell. */
	public snapshot(): RGB[] {
		return Array.from(this.colors, unpackColor);
	}
}
