import { scaleColor, type RGB } from "../utils/Color";
import type { IShader } from "./types";

/**
 * One directional term per face: every channel is multiplied by the
 * face's lighting intensity.
 */
export class FlatLitShader implements IShader {
	public readonly name = "FlatLit";

	public shade(color: RGB, intensity: number): RGB {
		return scaleColor(color, intensity);
	}
}
