import { describe, expect, it } from "vitest"
import { nearestPointOnSegment } from "../src/spherical-mercator"
import type { LonLat } from "../src/types"

describe("nearestPointOnSegment", () => {
	const a: LonLat = [0, 0]
	const b: LonLat = [0.002, 0]

	it("projects a point onto the middle of the segment", () => {
		const { pos, delta } = nearestPointOnSegment(a, b, [0.001, 0.0005])
		expect(delta).toBeCloseTo(0.5, 9)
		expect(pos[0]).toBeCloseTo(0.001, 9)
		expect(pos[1]).toBeCloseTo(0, 9)
	})

	it("works on segments in either direction", () => {
		const { delta } = nearestPointOnSegment(b, a, [0.0015, -0.0001])
		expect(delta).toBeCloseTo(0.25, 9)
	})

	it("clamps to the segment ends", () => {
		expect(nearestPointOnSegment(a, b, [-0.001, 0.001])).toEqual({
			pos: a,
			delta: 0,
		})
		expect(nearestPointOnSegment(a, b, [0.005, 0])).toEqual({
			pos: b,
			delta: 1,
		})
	})

	it("returns the start of a segment without length", () => {
		expect(nearestPointOnSegment(a, a, [1, 1])).toEqual({ pos: a, delta: 0 })
	})
})
