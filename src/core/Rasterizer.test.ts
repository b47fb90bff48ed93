import { describe, it, expect } from "vitest";
import { FrameBuffer } from "./FrameBuffer";
import { Rasterizer } from "./Rasterizer";
import { Point } from "../maths/Point";
import { Transform } from "../maths/Transform";
import { Triangle } from "../maths/Triangle";
import { FlatLitShader } from "../shaders/FlatLitShader";
import { UnlitShader } from "../shaders/UnlitShader";
import { Colors } from "../utils/Color";
import type { DrawContext } from "./types";

function setup(size = 20): { fb: FrameBuffer; rasterizer: Rasterizer } {
	const fb = new FrameBuffer(size, size);
	return { fb, rasterizer: new Rasterizer(fb) };
}

function context(overrides: Partial<DrawContext> = {}): DrawContext {
	return {
		transform: Transform.identity(),
		color: Colors.WHITE,
		light: Point.zero(),
		shader: new UnlitShader(),
		...overrides,
	};
}

function rowsOf(fb: FrameBuffer): number[] {
	return [...new Set(fb.drawnPixels().map(([, y]) => y))];
}

// Faces the viewer: its transformed normal is (0, 0, -1) and its centroid
// sits at z = 1.
const FLAT_TOP = new Triangle(
	new Point(2, 2, 1),
	new Point(2, 10, 1),
	new Point(10, 2, 1)
);

describe("Rasterizer", () => {
	describe("drawLine", () => {
		it("should paint exactly the Bresenham pixels from (0,0) to (5,3)", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(0, 0, 0), new Point(5, 3, 0), context());

			expect(fb.drawnPixels()).toEqual([
				[0, 0],
				[1, 1],
				[2, 1],
				[3, 2],
				[4, 2],
				[5, 3],
			]);
		});

		it("should paint both endpoints in every direction", () => {
			const cases: Array<[number, number, number, number]> = [
				[7, 9, 2, 1],
				[5, 3, 0, 0],
				[3, 0, 0, 7],
				[0, 0, 4, 4],
				[12, 6, 19, 6],
				[4, 18, 4, 2],
			];

			for (const [x1, y1, x2, y2] of cases) {
				const { fb, rasterizer } = setup();
				rasterizer.drawLine(new Point(x1, y1, 0), new Point(x2, y2, 0), context());

				expect(fb.getPixel(x1, y1)).toEqual(Colors.WHITE);
				expect(fb.getPixel(x2, y2)).toEqual(Colors.WHITE);
			}
		});

		it("should step the minor axis on steep lines", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(3, 0, 0), new Point(0, 7, 0), context());

			expect(fb.drawnPixels()).toEqual([
				[3, 0],
				[3, 1],
				[2, 2],
				[2, 3],
				[1, 4],
				[1, 5],
				[0, 6],
				[0, 7],
			]);
		});

		it("should paint a single pixel for a zero-length line", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(6, 6, 0), new Point(6, 6, 0), context());
			expect(fb.drawnPixels()).toEqual([[6, 6]]);
		});

		it("should interpolate depth along the line", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(0, 0, 2), new Point(4, 0, 6), context());

			expect(Array.from(fb.depths.subarray(0, 5))).toEqual([-2, -3, -4, -5, -6]);
		});

		it("should drop the pixels that fall outside the buffer", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(-3, 0, 0), new Point(3, 0, 0), context());

			expect(fb.drawnPixels()).toEqual([
				[0, 0],
				[1, 0],
				[2, 0],
				[3, 0],
			]);
		});

		it("should only walk the part of a far-reaching line inside the buffer", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(new Point(-1e8, 5, 0), new Point(1e8, 5, 0), context());

			expect(fb.countDrawn()).toBe(20);
			expect(rowsOf(fb)).toEqual([5]);
		});

		it("should keep the Bresenham slope when entering the buffer mid-line", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(
				new Point(-1e6, -1e6, 0),
				new Point(1e6, 1e6, 0),
				context()
			);

			expect(fb.drawnPixels()).toEqual(
				Array.from({ length: 20 }, (_, i) => [i, i])
			);
		});

		it("should transform the endpoints first", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawLine(
				new Point(0, 0, 0),
				new Point(2, 0, 0),
				context({ transform: Transform.translate({ x: 5, y: 5, z: 0 }) })
			);

			expect(fb.drawnPixels()).toEqual([
				[5, 5],
				[6, 5],
				[7, 5],
			]);
		});
	});

	describe("drawPoint", () => {
		it("should paint a 7x7 square centered on the point", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawPoint(new Point(10, 10, 2), context({ color: Colors.RED }));

			const drawn = fb.drawnPixels();
			expect(drawn).toHaveLength(49);
			expect(drawn[0]).toEqual([7, 7]);
			expect(drawn[48]).toEqual([13, 13]);
			expect(fb.getPixel(10, 10)).toEqual(Colors.RED);
			expect(fb.getDepth(13, 7)).toBe(-2);
		});

		it("should clip the square at the buffer edge", () => {
			const { fb, rasterizer } = setup();
			rasterizer.drawPoint(new Point(0, 0, 0), context());
			expect(fb.countDrawn()).toBe(16);
		});
	});

	describe("fillTriangle", () => {
		it("should fill a flat-top triangle row by row", () => {
			const { fb, rasterizer } = setup();
			expect(rasterizer.fillTriangle(FLAT_TOP, context())).toBe(true);

			expect(fb.countDrawn()).toBe(45);
			expect(rowsOf(fb)).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10]);
			expect(fb.getPixel(10, 2)).toEqual(Colors.WHITE);
			expect(fb.getPixel(2, 10)).toEqual(Colors.WHITE);
			expect(fb.getPixel(3, 10)).toEqual(Colors.BLACK);
			expect(fb.getDepth(5, 5)).toBe(-1);
		});

		it("should split the general case into two flat triangles", () => {
			const { fb, rasterizer } = setup();
			const t = new Triangle(
				new Point(4, 0, 1),
				new Point(0, 4, 1),
				new Point(4, 8, 1)
			);
			expect(rasterizer.fillTriangle(t, context())).toBe(true);

			expect(fb.countDrawn()).toBe(25);
			expect(rowsOf(fb)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
			expect(fb.getPixel(0, 4)).toEqual(Colors.WHITE);
			expect(fb.getPixel(0, 3)).toEqual(Colors.BLACK);
		});

		it("should cull a triangle facing away and write nothing", () => {
			const { fb, rasterizer } = setup();
			const away = new Triangle(FLAT_TOP.p1, FLAT_TOP.p3, FLAT_TOP.p2);

			expect(rasterizer.fillTriangle(away, context())).toBe(false);
			expect(fb.countDrawn()).toBe(0);
			expect(Array.from(fb.depths).every((d) => d === -Infinity)).toBe(true);
		});

		it("should cull collinear triangles", () => {
			const { fb, rasterizer } = setup();
			const line = new Triangle(
				new Point(1, 1, 1),
				new Point(5, 5, 1),
				new Point(9, 9, 1)
			);

			expect(rasterizer.fillTriangle(line, context())).toBe(false);
			expect(fb.countDrawn()).toBe(0);
		});

		it("should cull using the transformed normal", () => {
			const { fb, rasterizer } = setup();
			// Mirroring x flips the winding on screen.
			const mirrored = context({
				transform: Transform.scale(-1, 1, 1).compose(
					Transform.translate({ x: 15, y: 0, z: 0 })
				),
			});

			expect(rasterizer.fillTriangle(FLAT_TOP, mirrored)).toBe(false);
			expect(fb.countDrawn()).toBe(0);
		});

		it("should scale the fill color by the lighting intensity", () => {
			const { fb, rasterizer } = setup();
			// The light sits at centroid + (0, 4, -3): cos = 3/5 against (0, 0, -1).
			const light = FLAT_TOP.centroid().add({ x: 0, y: 4, z: -3 });

			rasterizer.fillTriangle(
				FLAT_TOP,
				context({
					color: { r: 200, g: 100, b: 0 },
					light,
					shader: new FlatLitShader(),
				})
			);

			expect(fb.getPixel(3, 3)).toEqual({ r: 120, g: 60, b: 0 });
		});

		it("should fill black when the light is behind the face", () => {
			const { fb, rasterizer } = setup();
			const light = FLAT_TOP.centroid().add({ x: 0, y: 0, z: 5 });

			rasterizer.fillTriangle(
				FLAT_TOP,
				context({ light, shader: new FlatLitShader() })
			);

			expect(fb.getPixel(3, 3)).toEqual(Colors.BLACK);
			expect(fb.getDepth(3, 3)).toBe(-1);
		});

		it("should ignore lighting with the unlit shader", () => {
			const { fb, rasterizer } = setup();
			const light = FLAT_TOP.centroid().add({ x: 0, y: 0, z: 5 });

			rasterizer.fillTriangle(FLAT_TOP, context({ light, color: Colors.CYAN }));
			expect(fb.getPixel(3, 3)).toEqual(Colors.CYAN);
		});
	});

	describe("flat fills", () => {
		it("should write one scanline per row from apex to base, both included", () => {
			const { fb, rasterizer } = setup();
			rasterizer.fillBottomFlatTriangle(
				new Point(5, 2, 0),
				new Point(9, 8, 0),
				new Point(2, 8, 0),
				Colors.WHITE
			);

			expect(rowsOf(fb)).toEqual([2, 3, 4, 5, 6, 7, 8]);
			expect(fb.countDrawn()).toBe(31);
			expect(fb.getPixel(2, 8)).toEqual(Colors.WHITE);
			expect(fb.getPixel(9, 8)).toEqual(Colors.WHITE);
		});

		it("should interpolate depth along both edges", () => {
			const { fb, rasterizer } = setup();
			rasterizer.fillTopFlatTriangle(
				new Point(0, 0, 0),
				new Point(8, 0, 8),
				new Point(0, 4, 4),
				Colors.WHITE
			);

			// Row 0 runs from z = 0 to z = 8; row 4 is the apex at z = 4.
			expect(fb.getDepth(0, 0)).toBeCloseTo(0);
			expect(fb.getDepth(8, 0)).toBe(-8);
			expect(fb.getDepth(4, 0)).toBe(-4);
			expect(fb.getDepth(0, 4)).toBe(-4);
			// Row 2 spans x = 0..4, from z = 2 on the left to z = 6 on the right.
			expect(fb.getDepth(0, 2)).toBe(-2);
			expect(fb.getDepth(2, 2)).toBe(-4);
			expect(fb.getDepth(4, 2)).toBe(-6);
		});
	});
});
