export interface IVector3 {
	x: number;
	y: number;
	z: number;
}

/** Homogeneous coordinate produced while applying a transform. */
export interface IVector4 extends IVector3 {
	w: number;
}

export type MatrixArr = number[][];

export type ReadonlyMatrixArr = ReadonlyArray<ReadonlyArray<number>>;
