/**
 * Common math utilities
 */

export function d2r(d: number): number {
	return (d * Math.PI) / 180;
}

export function clamp(val: number, min = 0, max = 1): number {
	return Math.max(min, Math.min(max, val));
}

export function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t;
}

/**
 * Fraction of the way `value` lies from `from` to `to`, clamped to [0, 1].
 * A zero-length range yields 0.
 */
export function progress(value: number, from: number, to: number): number {
	const range = to - from;
	if (range === 0) return 0;
	return clamp((value - from) / range, 0, 1);
}
