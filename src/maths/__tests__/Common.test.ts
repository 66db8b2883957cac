import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { clamp, d2r, solveQuadratic } from "../Common";
import { Vector3 } from "../Vector3";
import { Vector2 } from "../Vector2";
import { Ray } from "../Ray";

describe("solveQuadratic", () => {
	it("returns ordered roots", () => {
		// (x - 4)(x - 6) = x² - 10x + 24
		expect(solveQuadratic(1, -10, 24)).toEqual({ x0: 4, x1: 6 });
		// (x + 1)(x - 3) = x² - 2x - 3
		expect(solveQuadratic(1, -2, -3)).toEqual({ x0: -1, x1: 3 });
	});

	it("returns a double root when the discriminant is zero", () => {
		expect(solveQuadratic(1, -4, 4)).toEqual({ x0: 2, x1: 2 });
	});

	it("returns null without real roots", () => {
		expect(solveQuadratic(1, 0, 1)).toBeNull();
	});

	it("finds roots that satisfy the equation", () => {
		const coeff = fc.integer({ min: -100, max: 100 });
		fc.assert(
			fc.property(coeff, coeff, (r0, r1) => {
				// Build from known roots: x² - (r0 + r1)x + r0·r1
				const roots = solveQuadratic(1, -(r0 + r1), r0 * r1);
				if (!roots) return false;
				const lo = Math.min(r0, r1);
				const hi = Math.max(r0, r1);
				const tol = 1e-6 * (1 + Math.abs(lo) + Math.abs(hi));
				return (
					roots.x0 <= roots.x1 &&
					Math.abs(roots.x0 - lo) < tol &&
					Math.abs(roots.x1 - hi) < tol
				);
			})
		);
	});
});

describe("Common", () => {
	it("clamps to the unit interval by default", () => {
		expect(clamp(-0.5)).toBe(0);
		expect(clamp(0.25)).toBe(0.25);
		expect(clamp(3)).toBe(1);
		expect(clamp(5, -1, 2)).toBe(2);
	});

	it("converts degrees to radians", () => {
		expect(d2r(180)).toBeCloseTo(Math.PI, 15);
		expect(d2r(90)).toBeCloseTo(Math.PI / 2, 15);
	});
});

describe("Vector3", () => {
	it("leaves inputs untouched in the functional forms", () => {
		const a = new Vector3(1, 2, 3);
		const b = new Vector3(4, 5, 6);

		expect(Vector3.add(a, b)).toEqual(new Vector3(5, 7, 9));
		expect(Vector3.sub(b, a)).toEqual(new Vector3(3, 3, 3));
		expect(Vector3.scale(a, 2)).toEqual(new Vector3(2, 4, 6));
		expect(Vector3.addScaled(a, b, 2)).toEqual(new Vector3(9, 12, 15));
		expect(Vector3.negate(a)).toEqual(new Vector3(-1, -2, -3));
		expect(Vector3.lerp(a, b, 0.5)).toEqual(new Vector3(2.5, 3.5, 4.5));
		expect(a).toEqual(new Vector3(1, 2, 3));
		expect(b).toEqual(new Vector3(4, 5, 6));
	});

	it("computes dot and cross products", () => {
		const x = new Vector3(1, 0, 0);
		const y = new Vector3(0, 1, 0);

		expect(Vector3.dot(x, y)).toBe(0);
		expect(Vector3.cross(x, y)).toEqual(new Vector3(0, 0, 1));
		expect(Vector3.dot(new Vector3(1, 2, 3), { x: 4, y: 5, z: 6 })).toBe(32);
	});

	it("normalizes to unit length and leaves the zero vector alone", () => {
		const n = new Vector3(3, 0, 4).normalize();
		expect(n.x).toBeCloseTo(0.6, 12);
		expect(n.y).toBe(0);
		expect(n.z).toBeCloseTo(0.8, 12);
		expect(Vector3.length(new Vector3(0, 0, 0).normalize())).toBe(0);
		expect(new Vector3(1, 2, 2).lengthSq()).toBe(9);
	});
});

describe("Vector2", () => {
	it("blends barycentrically", () => {
		const st = Vector2.barycentric(
			{ x: 0, y: 0 },
			{ x: 1, y: 0 },
			{ x: 0, y: 1 },
			0.25,
			0.5
		);
		expect(st).toEqual(new Vector2(0.25, 0.5));
	});
});

describe("Ray", () => {
	it("normalizes its direction and copies its origin", () => {
		const origin = new Vector3(1, 2, 3);
		const ray = new Ray(origin, { x: 0, y: 0, z: -2 });
		origin.x = 9;

		expect(ray.origin).toEqual(new Vector3(1, 2, 3));
		expect(ray.direction).toEqual(new Vector3(0, 0, -1));
		expect(ray.at(2)).toEqual(new Vector3(1, 2, 1));
	});
});
