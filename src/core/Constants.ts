/**
 * Shared constants for the core rendering pipeline.
 */

/**
 * Core mathematical and basic rendering constants.
 */
export class CoreConstants {
	static readonly EPSILON = 1e-9;
	static readonly MAX_CHANNEL_VALUE = 255;
}

/**
 * Rasterization constants.
 */
export class RenderConstants {
	/** Side length, in pixels, of the square painted by drawPoint. */
	static readonly POINT_SIZE = 7;
	/** Depth of an empty cell: farther than anything that can be drawn. */
	static readonly CLEAR_DEPTH = Number.NEGATIVE_INFINITY;
}

/**
 * Frame pacing constants.
 */
export class FrameConstants {
	static readonly DEFAULT_WIDTH = 20;
	static readonly DEFAULT_HEIGHT = 20;
	static readonly DEFAULT_TARGET_FPS = 60;
	static readonly MS_PER_SECOND = 1000;
}
