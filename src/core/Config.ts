import { FrameConstants } from "./Constants";
import { ConfigError } from "./Errors";

export interface RasterConfig {
	/** Raster columns. */
	width: number;
	/** Raster rows. */
	height: number;
	/** Frame pacing target, frames per second. */
	targetFps: number;
}

export const DEFAULT_CONFIG: Readonly<RasterConfig> = Object.freeze({
	width: FrameConstants.DEFAULT_WIDTH,
	height: FrameConstants.DEFAULT_HEIGHT,
	targetFps: FrameConstants.DEFAULT_TARGET_FPS,
});

/**
 * Fills missing fields from DEFAULT_CONFIG and validates the result.
 * Throws a ConfigError naming every invalid field.
 */
export function resolveConfig(
	partial: Partial<RasterConfig> = {}
): RasterConfig {
	const config: RasterConfig = {
		width: partial.width ?? DEFAULT_CONFIG.width,
		height: partial.height ?? DEFAULT_CONFIG.height,
		targetFps: partial.targetFps ?? DEFAULT_CONFIG.targetFps,
	};

	const issues: string[] = [];
	for (const key of ["width", "height", "targetFps"] as const) {
		const value = config[key];
		if (!Number.isInteger(value) || value <= 0) {
			issues.push(`${key} must be a positive integer, got ${value}`);
		}
	}
	if (issues.length > 0) throw new ConfigError(issues);

	return config;
}

/** Frame budget in milliseconds. */
export function frameDuration(
	config: Pick<RasterConfig, "targetFps">
): number {
	return FrameConstants.MS_PER_SECOND / config.targetFps;
}
