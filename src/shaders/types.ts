import type { RGB } from "../utils/Color";

/**
 * Turns a triangle's draw color and its lighting intensity into the color
 * its pixels are filled with.
 */
export interface IShader {
	readonly name: string;
	shade(color: RGB, intensity: number): RGB;
}
