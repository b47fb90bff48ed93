/**
 * Color utility functions
 */

import { clamp } from "../maths/Common";
import { CoreConstants } from "../core/Constants";

export interface RGB {
	r: number;
	g: number;
	b: number;
}

export const Colors = {
	BLACK: { r: 0, g: 0, b: 0 },
	WHITE: { r: 255, g: 255, b: 255 },
	RED: { r: 255, g: 0, b: 0 },
	GREEN: { r: 0, g: 255, b: 0 },
	BLUE: { r: 0, g: 0, b: 255 },
	YELLOW: { r: 255, g: 255, b: 0 },
	CYAN: { r: 0, g: 255, b: 255 },
	MAGENTA: { r: 255, g: 0, b: 255 },
	GRAY: { r: 128, g: 128, b: 128 },
} as const satisfies Record<string, RGB>;

export type ColorName = keyof typeof Colors;

/** Glyphs from darkest to brightest; black is always a blank cell. */
const GLYPH_RAMP = " .:-=+*#%@";

function toChannel(value: number): number {
	return clamp(Math.round(value), 0, CoreConstants.MAX_CHANNEL_VALUE);
}

/** Packs a color as 0xRRGGBB, clamping every channel to 0–255. */
export function packColor(color: RGB): number {
	return (
		((toChannel(color.r) << 16) |
			(toChannel(color.g) << 8) |
			toChannel(color.b)) >>>
		0
	);
}

export function unpackColor(packed: number): RGB {
	return {
		r: (packed >>> 16) & 0xff,
		g: (packed >>> 8) & 0xff,
		b: packed & 0xff,
	};
}

export function colorsEqual(a: RGB, b: RGB): boolean {
	return packColor(a) === packColor(b);
}

/**
 * Multiplies every channel by `factor`, rounding and clamping to 0–255.
 */
export function scaleColor(color: RGB, factor: number): RGB {
	return {
		r: toChannel(color.r * factor),
		g: toChannel(color.g * factor),
		b: toChannel(color.b * factor),
	};
}

/** Rec. 601 luma in [0, 1]. */
export function luminance(color: RGB): number {
	const weighted = 0.299 * color.r + 0.587 * color.g + 0.114 * color.b;
	return weighted / CoreConstants.MAX_CHANNEL_VALUE;
}

/**
 * Maps a color to a printable glyph for text output devices.
 */
export function colorToChar(color: RGB): string {
	const l = luminance(color);
	if (l <= 0) return GLYPH_RAMP[0];
	const steps = GLYPH_RAMP.length - 1;
	const index = Math.max(1, Math.ceil(l * steps));
	return GLYPH_RAMP[Math.min(steps, index)];
}

/**
 * Parses `#rgb`, `#rrggbb`, `rgb(r, g, b)` or a name from {@link Colors}
 * (case-insensitive). Returns null for anything else.
 */
export function parseColor(input: string): RGB | null {
	const value = input.trim();

	const hexMatch = value.match(/^#([0-9a-f]{3}|[0-9a-f]{6})$/i);
	if (hexMatch) {
		let hex = hexMatch[1];
		if (hex.length === 3) {
			hex = hex
				.split("")
				.map((c) => c + c)
				.join("");
		}
		return unpackColor(parseInt(hex, 16));
	}

	const rgbMatch = value.match(
		/^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/i
	);
	if (rgbMatch) {
		const [r, g, b] = rgbMatch.slice(1, 4).map(Number);
		if (r > 255 || g > 255 || b > 255) return null;
		return { r, g, b };
	}

	const name = value.toUpperCase();
	if (isColorName(name)) {
		return { ...Colors[name] };
	}

	return null;
}

function isColorName(name: string): name is ColorName {
	return Object.prototype.hasOwnProperty.call(Colors, name);
}
