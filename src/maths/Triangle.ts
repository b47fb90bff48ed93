import { Point } from "./Point";
import type { Transform } from "./Transform";

/**
 * A triangle with one horizontal edge, ready for a single scanline sweep.
 * The two vertices of the flat edge are in caller order; the fill routine
 * sorts them by x.
 */
export type FlatTriangle =
	| { kind: "flatBottom"; top: Point; a: Point; b: Point }
	| { kind: "flatTop"; a: Point; b: Point; bottom: Point };

export class Triangle {
	constructor(
		public readonly p1: Point,
		public readonly p2: Point,
		public readonly p3: Point
	) {}

	public toArray(): [Point, Point, Point] {
		return [this.p1, this.p2, this.p3];
	}

	public apply(transform: Transform): Triangle {
		return new Triangle(
			this.p1.apply(transform),
			this.p2.apply(transform),
			this.p3.apply(transform)
		);
	}

	public centroid(): Point {
		return this.p1
			.add(this.p2)
			.add(this.p3)
			.scale(1 / 3);
	}

	/**
	 * Unit face normal, (p2 - p1) × (p3 - p1). Collinear vertices give the
	 * zero vector.
	 */
	public normal(): Point {
		const u = this.p2.sub(this.p1);
		const v = this.p3.sub(this.p1);
		return u.cross(v).normalized();
	}

	/**
	 * Vertices ordered by ascending y. Array.prototype.sort is stable, so
	 * vertices at the same height keep their caller order.
	 */
	public sortedByHeight(): [Point, Point, Point] {
		const [top, middle, bottom] = this.toArray().sort((a, b) => a.y - b.y);
		return [top, middle, bottom];
	}

	/**
	 * Decomposes the triangle into at most two flat triangles. The general
	 * case is cut at the middle vertex's height by a synthetic point on the
	 * top-to-bottom edge, with x and z interpolated.
	 */
	public split(): FlatTriangle[] {
		const [top, middle, bottom] = this.sortedByHeight();

		if (top.y === middle.y) {
			return [{ kind: "flatTop", a: top, b: middle, bottom }];
		}
		if (middle.y === bottom.y) {
			return [{ kind: "flatBottom", top, a: middle, b: bottom }];
		}

		const t = (middle.y - top.y) / (bottom.y - top.y);
		const v4 = new Point(
			top.x + t * (bottom.x - top.x),
			middle.y,
			top.z + t * (bottom.z - top.z)
		);

		return [
			{ kind: "flatBottom", top, a: middle, b: v4 },
			{ kind: "flatTop", a: middle, b: v4, bottom },
		];
	}
}
