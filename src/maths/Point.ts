/**
 * Point class: an immutable 3-D coordinate.
 *
 * The same type is used for model, world and screen space; which one a
 * given instance lives in is implied by the pipeline stage that produced it.
 */

import { Transform } from "./Transform";
import { CoreConstants } from "../core/Constants";
import type { IVector3 } from "./types";

export class Point implements IVector3 {
	constructor(
		public readonly x: number = 0,
		public readonly y: number = 0,
		public readonly z: number = 0
	) {}

	public static from(v: IVector3): Point {
		return v instanceof Point ? v : new Point(v.x, v.y, v.z);
	}

	public static zero(): Point {
		return new Point(0, 0, 0);
	}

	public add(v: IVector3): Point {
		return new Point(this.x + v.x, this.y + v.y, this.z + v.z);
	}

	public sub(v: IVector3): Point {
		return new Point(this.x - v.x, this.y - v.y, this.z - v.z);
	}

	public scale(s: number): Point {
		return new Point(this.x * s, this.y * s, this.z * s);
	}

	public dot(v: IVector3): number {
		return this.x * v.x + this.y * v.y + this.z * v.z;
	}

	public cross(v: IVector3): Point {
		return new Point(
			this.y * v.z - this.z * v.y,
			this.z * v.x - this.x * v.z,
			this.x * v.y - this.y * v.x
		);
	}

	public length(): number {
		return Math.hypot(this.x, this.y, this.z);
	}

	/**
	 * Unit vector in the same direction. A zero-length vector has no
	 * direction and normalizes to the zero vector.
	 */
	public normalized(): Point {
		const len = this.length();
		if (len < CoreConstants.EPSILON) return Point.zero();
		return this.scale(1 / len);
	}

	/**
	 * Applies `transform` as `[x, y, z, 1] · T`, followed by the perspective
	 * divide when the resulting w is neither 1 nor 0.
	 */
	public apply(transform: Transform): Point {
		const { x, y, z, w } = Transform.transformPoint(transform, this);
		if (w === 1 || Math.abs(w) < CoreConstants.EPSILON) {
			return new Point(x, y, z);
		}
		const invW = 1 / w;
		return new Point(x * invW, y * invW, z * invW);
	}

	public equals(v: IVector3, epsilon = 0): boolean {
		return (
			Math.abs(this.x - v.x) <= epsilon &&
			Math.abs(this.y - v.y) <= epsilon &&
			Math.abs(this.z - v.z) <= epsilon
		);
	}

	public toString(): string {
		return `(${this.x}, ${this.y}, ${this.z})`;
	}
}
