import type { RGB } from "../utils/Color";
import type { IShader } from "./types";

export class UnlitShader implements IShader {
	public readonly name = "Unlit";

	public shade(color: RGB, _intensity: number): RGB {
		return { r: color.r, g: color.g, b: color.b };
	}
}
