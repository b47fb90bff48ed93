import { describe, it, expect } from "vitest";
import { computeLightIntensity } from "./Lighting";
import { FlatLitShader } from "./FlatLitShader";
import { UnlitShader } from "./UnlitShader";
import { Point } from "../maths/Point";

const NORMAL = new Point(0, 0, -1);
const CENTROID = new Point(3, 3, 1);

describe("computeLightIntensity", () => {
	it("should be full when the light sits along the normal", () => {
		const light = CENTROID.add({ x: 0, y: 0, z: -10 });
		expect(computeLightIntensity(light, CENTROID, NORMAL)).toBeCloseTo(1, 10);
	});

	it("should follow the cosine of the incidence angle", () => {
		const light = CENTROID.add({ x: 0, y: Math.sqrt(3), z: -1 });
		expect(computeLightIntensity(light, CENTROID, NORMAL)).toBeCloseTo(0.5, 10);
	});

	it("should be zero for a light behind the face", () => {
		const light = CENTROID.add({ x: 1, y: 0, z: 5 });
		expect(computeLightIntensity(light, CENTROID, NORMAL)).toBe(0);
	});

	it("should be zero for a light on the centroid", () => {
		expect(computeLightIntensity(CENTROID, CENTROID, NORMAL)).toBe(0);
	});
});

describe("shaders", () => {
	const color = { r: 200, g: 101, b: 0 };

	it("should scale the draw color by the intensity", () => {
		expect(new FlatLitShader().shade(color, 0.5)).toEqual({ r: 100, g: 51, b: 0 });
	});

	it("should ignore the intensity when unlit", () => {
		const shaded = new UnlitShader().shade(color, 0);
		expect(shaded).toEqual(color);
		expect(shaded).not.toBe(color);
	});
});
