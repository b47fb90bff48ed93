import { RenderConstants } from "./Constants";
import { lerp, progress } from "../maths/Common";
import { computeLightIntensity } from "../shaders/Lighting";
import type { FrameBuffer } from "./FrameBuffer";
import type { DrawContext } from "./types";
import type { Point } from "../maths/Point";
import type { Triangle } from "../maths/Triangle";
import type { RGB } from "../utils/Color";

export interface RasterizerLike {
	drawPoint(p: Point, ctx: DrawContext): void;
	drawLine(p1: Point, p2: Point, ctx: DrawContext): void;
	fillTriangle(t: Triangle, ctx: DrawContext): boolean;
}

/**
 * Rasterizer converts primitives into FrameBuffer writes.
 *
 * CORE CONVENTIONS:
 * - Every primitive is transformed by ctx.transform before it is drawn
 * - Screen coordinates are floored to integer pixels
 * - Depth written is -z of the transformed point (larger = nearer)
 * - Nothing is clipped: out-of-bounds writes are dropped by the FrameBuffer
 */
export class Rasterizer implements RasterizerLike {
	constructor(private readonly _frameBuffer: FrameBuffer) {}

	/**
	 * Paints a POINT_SIZE × POINT_SIZE square centered on the projected point.
	 */
	public drawPoint(point: Point, ctx: DrawContext): void {
		const p = point.apply(ctx.transform);
		const size = RenderConstants.POINT_SIZE;
		const half = Math.floor(size / 2);
		const cx = Math.floor(p.x);
		const cy = Math.floor(p.y);
		const depth = -p.z;

		for (let row = 0; row < size; row++) {
			this._frameBuffer.setRow(
				cx - half,
				cx + half,
				cy + row - half,
				depth,
				depth,
				ctx.color
			);
		}
	}

	/**
	 * Bresenham line between the projected endpoints, both inclusive. Depth
	 * is interpolated along the dominant axis.
	 *
	 * Only the steps whose dominant coordinate lands inside the buffer are
	 * visited, so the cost is bounded by the buffer size however far the
	 * endpoints project.
	 */
	public drawLine(p1: Point, p2: Point, ctx: DrawContext): void {
		const a = p1.apply(ctx.transform);
		const b = p2.apply(ctx.transform);
		const x1 = Math.floor(a.x),
			y1 = Math.floor(a.y),
			x2 = Math.floor(b.x),
			y2 = Math.floor(b.y);

		if (![x1, y1, x2, y2].every(Number.isFinite)) return;

		const adx = Math.abs(x2 - x1);
		const ady = Math.abs(y2 - y1);
		const xStep = x2 > x1 ? 1 : -1;
		const yStep = y2 > y1 ? 1 : -1;

		const xDominant = adx >= ady;
		const major = xDominant ? adx : ady;
		const minor = xDominant ? ady : adx;

		const [first, last] = xDominant
			? this._visibleSteps(x1, xStep, major, this._frameBuffer.width)
			: this._visibleSteps(y1, yStep, major, this._frameBuffer.height);

		for (let k = first; k <= last; k++) {
			// Minor offset after k steps of the integer-error walk: the error
			// test 2e > major fires once per multiple of major crossed.
			const m =
				major === 0
					? 0
					: Math.floor((2 * k * minor + major - 1) / (2 * major));
			const x = x1 + (xDominant ? k : m) * xStep;
			const y = y1 + (xDominant ? m : k) * yStep;

			const t = major === 0 ? 0 : k / major;
			this._frameBuffer.setPixel(x, y, -lerp(a.z, b.z, t), ctx.color);
		}
	}

	/**
	 * Culls, lights and scan-converts a triangle. Returns false when the
	 * triangle was culled and nothing was written.
	 */
	public fillTriangle(t: Triangle, ctx: DrawContext): boolean {
		const centroid = t.centroid();
		const ct = t.apply(ctx.transform);

		// Zero (collinear) and NaN normals fail the test too.
		if (!(ct.normal().dot(centroid) < 0)) return false;

		const intensity = computeLightIntensity(ctx.light, centroid, t.normal());
		const color = ctx.shader.shade(ctx.color, intensity);

		for (const flat of ct.split()) {
			if (flat.kind === "flatBottom") {
				this.fillBottomFlatTriangle(flat.top, flat.a, flat.b, color);
			} else {
				this.fillTopFlatTriangle(flat.a, flat.b, flat.bottom, color);
			}
		}
		return true;
	}

	/**
	 * Scanline fill of a triangle whose base (a, b) is horizontal and lies
	 * below the apex. Rows from the apex to the base are drawn, both included.
	 */
	public fillBottomFlatTriangle(
		top: Point,
		a: Point,
		b: Point,
		color: RGB
	): void {
		const [left, right] = a.x <= b.x ? [a, b] : [b, a];
		const dy = left.y - top.y;
		const invSlopeLeft = dy === 0 ? 0 : (left.x - top.x) / dy;
		const invSlopeRight = dy === 0 ? 0 : (right.x - top.x) / dy;

		const yStart = Math.floor(top.y);
		const yEnd = Math.floor(left.y);

		for (let y = this._firstRow(yStart); y <= this._lastRow(yEnd); y++) {
			const t = progress(y, top.y, left.y);
			const zLeft = lerp(top.z, left.z, t);
			const zRight = lerp(top.z, right.z, t);

			// The base row uses the exact base vertices.
			const onBase = y === yEnd;
			const xLeft = onBase ? left.x : top.x + invSlopeLeft * (y - yStart);
			const xRight = onBase ? right.x : top.x + invSlopeRight * (y - yStart);

			this._frameBuffer.setRow(
				Math.floor(xLeft),
				Math.floor(xRight),
				y,
				-zLeft,
				-zRight,
				color
			);
		}
	}

	/**
	 * Scanline fill of a triangle whose top edge (a, b) is horizontal and
	 * lies above the apex.
	 */
	public fillTopFlatTriangle(
		a: Point,
		b: Point,
		bottom: Point,
		color: RGB
	): void {
		const [left, right] = a.x <= b.x ? [a, b] : [b, a];
		const dy = bottom.y - left.y;
		const invSlopeLeft = dy === 0 ? 0 : (bottom.x - left.x) / dy;
		const invSlopeRight = dy === 0 ? 0 : (bottom.x - right.x) / dy;

		const yStart = Math.floor(left.y);
		const yEnd = Math.floor(bottom.y);

		for (let y = this._firstRow(yStart); y <= this._lastRow(yEnd); y++) {
			const t = progress(y, left.y, bottom.y);
			const step = y - yStart;

			this._frameBuffer.setRow(
				Math.floor(left.x + invSlopeLeft * step),
				Math.floor(right.x + invSlopeRight * step),
				y,
				-lerp(left.z, bottom.z, t),
				-lerp(right.z, bottom.z, t),
				color
			);
		}
	}

	/**
	 * Range of steps k in [0, steps] for which start + k * step lies in
	 * [0, size). Empty when first > last.
	 */
	private _visibleSteps(
		start: number,
		step: number,
		steps: number,
		size: number
	): [number, number] {
		if (step > 0) {
			return [Math.max(0, -start), Math.min(steps, size - 1 - start)];
		}
		return [Math.max(0, start - (size - 1)), Math.min(steps, start)];
	}

	// Rows outside the buffer would be dropped anyway; skip them.
	private _firstRow(y: number): number {
		return Math.max(0, y);
	}

	private _lastRow(y: number): number {
		return Math.min(this._frameBuffer.height - 1, y);
	}
}
