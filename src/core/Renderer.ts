import { EventEmitter } from "./EventEmitter";
import { FrameBuffer } from "./FrameBuffer";
import { Rasterizer, type RasterizerLike } from "./Rasterizer";
import { Point } from "../maths/Point";
import { Transform } from "../maths/Transform";
import { FlatLitShader } from "../shaders/FlatLitShader";
import { Colors, type RGB } from "../utils/Color";
import type { Triangle } from "../maths/Triangle";
import type { IVector3 } from "../maths/types";
import type { IShader } from "../shaders/types";
import type { DrawContext, OutputDevice } from "./types";

/**
 * CORE RENDERING CONVENTIONS:
 * - Row vectors: points are transformed as p' = p · T
 * - Transform calls accumulate; the earliest call acts closest to the point
 * - Screen Space: (0,0) at top-left, one unit per pixel
 * - Depth: -z of the transformed point, larger is nearer
 */

export interface RendererOptions {
	/** Color the frame is cleared to. */
	background?: RGB;
	/** Initial draw color. */
	color?: RGB;
	shader?: IShader;
	depthTest?: boolean;
}

export type RendererEvents = {
	clear: [];
	display: [frame: FrameBuffer];
};

function createContext(context: DrawContext): DrawContext {
	return Object.freeze({
		transform: context.transform,
		color: Object.freeze({ ...context.color }),
		light: context.light,
		shader: context.shader,
	});
}

export class Renderer extends EventEmitter<RendererEvents> {
	public readonly frameBuffer: FrameBuffer;
	public rasterizer: RasterizerLike;

	private readonly _device: OutputDevice;
	private _context: DrawContext;

	constructor(device: OutputDevice, options: RendererOptions = {}) {
		super();
		this._device = device;

		this.frameBuffer = new FrameBuffer(
			device.width,
			device.height,
			options.background ?? Colors.BLACK
		);
		this.frameBuffer.depthTest = options.depthTest ?? false;
		this.rasterizer = new Rasterizer(this.frameBuffer);

		this._context = createContext({
			transform: Transform.identity(),
			color: options.color ?? Colors.WHITE,
			light: Point.zero(),
			shader: options.shader ?? new FlatLitShader(),
		});
	}

	public get context(): DrawContext {
		return this._context;
	}

	public get transform(): Transform {
		return this._context.transform;
	}

	public get device(): OutputDevice {
		return this._device;
	}

	public drawPoint(p: IVector3): void {
		this.rasterizer.drawPoint(Point.from(p), this._context);
	}

	public drawLine(p1: IVector3, p2: IVector3): void {
		this.rasterizer.drawLine(Point.from(p1), Point.from(p2), this._context);
	}

	/**
	 * Returns false when the triangle faced away and was culled.
	 */
	public fillTriangle(t: Triangle): boolean {
		return this.rasterizer.fillTriangle(t, this._context);
	}

	/**
	 * Runs `draw` with parts of the draw context overridden and restores the
	 * previous context afterwards, including when `draw` throws. `draw` must
	 * be synchronous.
	 */
	public withContext<T>(
		overrides: Partial<DrawContext>,
		draw: (renderer: this) => T
	): T {
		const previous = this._context;
		this._context = createContext({ ...previous, ...overrides });
		try {
			return draw(this);
		} finally {
			this._context = previous;
		}
	}

	public withTransform<T>(
		transform: Transform,
		draw: (renderer: this) => T
	): T {
		return this.withContext({ transform }, draw);
	}

	public drawPointWithTransform(p: IVector3, transform: Transform): void {
		this.withTransform(transform, (r) => r.drawPoint(p));
	}

	public drawLineWithTransform(
		p1: IVector3,
		p2: IVector3,
		transform: Transform
	): void {
		this.withTransform(transform, (r) => r.drawLine(p1, p2));
	}

	public clear(): void {
		this.frameBuffer.clear();
		this.emit("clear");
	}

	/**
	 * Hands the finished frame to the output device. Device failures reach
	 * the caller unchanged.
	 */
	public async display(): Promise<void> {
		await this._device.display(this.frameBuffer);
		this.emit("display", this.frameBuffer);
	}

	public setTransform(transform: Transform): void {
		this._update({ transform });
	}

	public clearTransform(): void {
		this._update({ transform: Transform.identity() });
	}

	public translate(offset: IVector3): void {
		this._append(Transform.translate(offset));
	}

	public rotateX(theta: number): void {
		this._append(Transform.rotateX(theta));
	}

	public rotateY(theta: number): void {
		this._append(Transform.rotateY(theta));
	}

	public rotateZ(theta: number): void {
		this._append(Transform.rotateZ(theta));
	}

	public scale(x: number, y: number, z: number): void {
		this._append(Transform.scale(x, y, z));
	}

	public perspective(): void {
		this._append(Transform.perspective());
	}

	public setColor(color: RGB): void {
		this._update({ color });
	}

	public setLightPos(position: IVector3): void {
		this._update({ light: Point.from(position) });
	}

	public setShader(shader: IShader): void {
		this._update({ shader });
	}

	public setDepthTest(enabled: boolean): void {
		this.frameBuffer.depthTest = enabled;
	}

	private _append(op: Transform): void {
		this._update({ transform: this._context.transform.compose(op) });
	}

	private _update(changes: Partial<DrawContext>): void {
		this._context = createContext({ ...this._context, ...changes });
	}
}
