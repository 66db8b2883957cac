export interface IVector2 {
	x: number;
	y: number;
}

export interface IVector3 {
	x: number;
	y: number;
	z: number;
}

/**
 * Roots of a real quadratic, ordered so that `x0 <= x1`.
 */
export interface QuadraticRoots {
	x0: number;
	x1: number;
}
