import { Point } from "../maths/Point";
import type { IVector3 } from "../maths/types";

/**
 * Lambert term for a face: the unit vector from `centroid` towards `light`
 * dotted with the face normal, clamped at zero.
 */
export function computeLightIntensity(
	light: IVector3,
	centroid: IVector3,
	normal: IVector3
): number {
	const toLight = Point.from(light).sub(centroid).normalized();
	return Math.max(0, toLight.dot(normal));
}
