/**
 * Transform class (4x4 Matrix)
 */

import type {
	IVector3,
	IVector4,
	MatrixArr,
	ReadonlyMatrixArr,
} from "./types";

const IDENTITY: ReadonlyMatrixArr = [
	[1, 0, 0, 0],
	[0, 1, 0, 0],
	[0, 0, 1, 0],
	[0, 0, 0, 1],
];

/**
 * MATRIX CONVENTIONS:
 * - Row vectors: a point is transformed as p' = [x, y, z, 1] · M
 * - Translation lives in the bottom row, elements[3][0..2]
 * - compose(A, B) applies A first, then B (matrix product A × B)
 * - Elements are copied on construction and frozen
 */
export class Transform {
	public readonly elements: ReadonlyMatrixArr;

	constructor(elements: ReadonlyMatrixArr = IDENTITY) {
		this.elements = Object.freeze(
			elements.map((row) => Object.freeze([...row]))
		);
	}

	public static identity(): Transform {
		return new Transform();
	}

	public static translate(p: IVector3): Transform {
		return new Transform([
			[1, 0, 0, 0],
			[0, 1, 0, 0],
			[0, 0, 1, 0],
			[p.x, p.y, p.z, 1],
		]);
	}

	public static rotateX(theta: number): Transform {
		const c = Math.cos(theta),
			s = Math.sin(theta);
		return new Transform([
			[1, 0, 0, 0],
			[0, c, s, 0],
			[0, -s, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotateY(theta: number): Transform {
		const c = Math.cos(theta),
			s = Math.sin(theta);
		return new Transform([
			[c, 0, -s, 0],
			[0, 1, 0, 0],
			[s, 0, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotateZ(theta: number): Transform {
		const c = Math.cos(theta),
			s = Math.sin(theta);
		return new Transform([
			[c, s, 0, 0],
			[-s, c, 0, 0],
			[0, 0, 1, 0],
			[0, 0, 0, 1],
		]);
	}

	public static scale(sx: number, sy: number, sz: number): Transform {
		return new Transform([
			[sx, 0, 0, 0],
			[0, sy, 0, 0],
			[0, 0, sz, 0],
			[0, 0, 0, 1],
		]);
	}

	/**
	 * Fixed projective matrix: (x, y, z, 1) becomes (x, y, z - 1, z), so the
	 * divide scales x and y by 1/z and maps depth to 1 - 1/z.
	 */
	public static perspective(): Transform {
		return new Transform([
			[1, 0, 0, 0],
			[0, 1, 0, 0],
			[0, 0, 1, 1],
			[0, 0, -1, 0],
		]);
	}

	public static multiply(a: Transform, b: Transform): Transform {
		const ae = a.elements;
		const be = b.elements;

		const res: MatrixArr = Array(4)
			.fill(null)
			.map(() => Array<number>(4).fill(0));

		for (let i = 0; i < 4; i++) {
			for (let j = 0; j < 4; j++) {
				res[i][j] =
					ae[i][0] * be[0][j] +
					ae[i][1] * be[1][j] +
					ae[i][2] * be[2][j] +
					ae[i][3] * be[3][j];
			}
		}

		return new Transform(res);
	}

	/**
	 * Returns the transform that applies `first`, then `second`.
	 */
	public static compose(first: Transform, second: Transform): Transform {
		return Transform.multiply(first, second);
	}

	public compose(next: Transform): Transform {
		return Transform.compose(this, next);
	}

	/**
	 * Homogeneous product [x, y, z, 1] · M, without the divide.
	 */
	public static transformPoint(m: Transform, point: IVector3): IVector4 {
		const me = m.elements;
		const { x, y, z } = point;

		return {
			x: x * me[0][0] + y * me[1][0] + z * me[2][0] + me[3][0],
			y: x * me[0][1] + y * me[1][1] + z * me[2][1] + me[3][1],
			z: x * me[0][2] + y * me[1][2] + z * me[2][2] + me[3][2],
			w: x * me[0][3] + y * me[1][3] + z * me[2][3] + me[3][3],
		};
	}

	public equals(other: Transform, epsilon = 0): boolean {
		for (let i = 0; i < 4; i++) {
			for (let j = 0; j < 4; j++) {
				if (Math.abs(this.elements[i][j] - other.elements[i][j]) > epsilon) {
					return false;
				}
			}
		}
		return true;
	}

	public clone(): Transform {
		return new Transform(this.elements.map((row) => [...row]));
	}

	/** Row-major flat copy of the 16 coefficients. */
	public toArray(): number[] {
		return this.elements.flat();
	}
}
