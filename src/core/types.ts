import type { Point } from "../maths/Point";
import type { Transform } from "../maths/Transform";
import type { IShader } from "../shaders/types";
import type { RGB } from "../utils/Color";
import type { FrameBuffer } from "./FrameBuffer";

/**
 * Everything a primitive needs besides its geometry. Contexts are frozen;
 * changing state means building a new one.
 */
export interface DrawContext {
	readonly transform: Transform;
	readonly color: RGB;
	readonly light: Point;
	readonly shader: IShader;
}

/**
 * Capability the renderer publishes finished frames through.
 */
export interface OutputDevice {
	readonly width: number;
	readonly height: number;
	display(frame: FrameBuffer): Promise<void>;
}
