import { parseArgs } from "node:util";
import { resolveConfig, type RasterConfig } from "../core/Config";
import { ConfigError } from "../core/Errors";
import { parseColor, type RGB } from "./Color";

export interface DemoOptions {
	config: RasterConfig;
	/** Frames to render before exiting; unbounded when undefined. */
	frames?: number;
	color?: RGB;
	clearScreen: boolean;
}

function toNumber(value: string | undefined): number | undefined {
	return value === undefined ? undefined : Number(value);
}

/**
 * Parses `--width`, `--height`, `--fps`, `--frames`, `--color` and
 * `--no-clear`. Throws a ConfigError for values that cannot be used.
 */
export function parseDemoArgs(args: string[]): DemoOptions {
	const { values } = parseArgs({
		args,
		options: {
			width: { type: "string" },
			height: { type: "string" },
			fps: { type: "string" },
			frames: { type: "string" },
			color: { type: "string" },
			"no-clear": { type: "boolean", default: false },
		},
	});

	const config = resolveConfig({
		width: toNumber(values.width),
		height: toNumber(values.height),
		targetFps: toNumber(values.fps),
	});

	const frames = toNumber(values.frames);
	if (frames !== undefined && (!Number.isInteger(frames) || frames <= 0)) {
		throw new ConfigError([
			`frames must be a positive integer, got ${values.frames}`,
		]);
	}

	let color: RGB | undefined;
	if (values.color !== undefined) {
		const parsed = parseColor(values.color);
		if (!parsed) {
			throw new ConfigError([`color is not recognised: ${values.color}`]);
		}
		color = parsed;
	}

	return {
		config,
		frames,
		color,
		clearScreen: !values["no-clear"],
	};
}
