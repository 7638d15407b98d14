import { SphericalMercator } from "@mapbox/sphericalmercator"
import { assertValue } from "./assert"
import type { LonLat, XY } from "./types"

const merc = new SphericalMercator({ size: 256 })

/**
 * The point on a segment closest to a query point.
 * `delta` is the fraction of the way from `a` to `b`, always within [0, 1].
 */
export interface SegmentPoint {
	pos: LonLat
	delta: number
}

/**
 * Find the point on the segment `a`-`b` nearest to `point`.
 *
 * Distances are compared in web mercator meters, which keeps angles true at
 * the scale of a single way segment.
 */
export function nearestPointOnSegment(
	a: LonLat,
	b: LonLat,
	point: LonLat,
): SegmentPoint {
	const [ax, ay] = forward(a)
	const [bx, by] = forward(b)
	const [px, py] = forward(point)
	const dx = bx - ax
	const dy = by - ay
	const lengthSquared = dx * dx + dy * dy
	if (lengthSquared === 0) return { pos: a, delta: 0 }

	const t = ((px - ax) * dx + (py - ay) * dy) / lengthSquared
	const delta = Math.max(0, Math.min(1, t))
	if (delta === 0) return { pos: a, delta }
	if (delta === 1) return { pos: b, delta }
	return { pos: inverse([ax + dx * delta, ay + dy * delta]), delta }
}

function forward(ll: LonLat): XY {
	return toPair(merc.forward(ll))
}

function inverse(xy: XY): LonLat {
	return toPair(merc.inverse(xy))
}

function toPair(values: ArrayLike<number>): [number, number] {
	const first = values[0]
	const second = values[1]
	assertValue(first, "Projection returned no x coordinate")
	assertValue(second, "Projection returned no y coordinate")
	return [first, second]
}
