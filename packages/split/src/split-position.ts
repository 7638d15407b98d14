/**
 * Resolve requested split positions against the current node list of a way.
 *
 * @module
 */

import type { WayComplete } from "@waysplit/core"
import { assertNever } from "@waysplit/shared/assert"
import { haversineDistance } from "@waysplit/shared/haversine-distance"
import { nearestPointOnSegment } from "@waysplit/shared/spherical-mercator"
import type { LonLat } from "@waysplit/shared/types"
import { isLonLatEqual, nodeLonLat } from "@waysplit/shared/utils"
import { ConflictError } from "./errors"
import type { SplitPolylineAtPosition, SplitWayAt } from "./types"

/**
 * Positions of all nodes of the way, in order.
 * @throws ConflictError if a node of the way is missing.
 */
export function getWayPositions({ way, nodes }: WayComplete): LonLat[] {
	return way.refs.map((ref) => {
		const node = nodes.get(ref)
		if (node == null)
			throw new ConflictError(`Node ${ref} of way ${way.id} is not available`)
		return nodeLonLat(node)
	})
}

/**
 * Position of a resolved split along the way, in node indexes. A split on a
 * segment lies between the indexes of its two nodes.
 */
export function splitWayAtPosition(split: SplitWayAt): number {
	switch (split.type) {
		case "index":
			return split.index
		case "line":
			return split.index1 + split.delta
		default:
			return assertNever(split)
	}
}

/**
 * Resolve one split request against the node positions of a way.
 *
 * @throws ConflictError if the position is not (or no longer) on the way.
 */
export function toSplitWayAt(
	split: SplitPolylineAtPosition,
	positions: LonLat[],
	isClosed: boolean,
	maxSplitDistanceMeters = Number.POSITIVE_INFINITY,
): SplitWayAt {
	switch (split.type) {
		case "point": {
			const index = positions.findIndex((pos) => isLonLatEqual(pos, split.pos))
			if (index === -1)
				throw new ConflictError("Split position is not on the way anymore")
			return toNodeSplit(index, split.pos, positions, isClosed)
		}
		case "line": {
			const index1 = findSegment(positions, split.pos1, split.pos2)
			const start = positions[index1]
			const end = positions[index1 + 1]
			if (index1 === -1 || start == null || end == null)
				throw new ConflictError("Split position is not on the way anymore")
			const { pos, delta } = nearestPointOnSegment(start, end, split.pos)
			if (haversineDistance(pos, split.pos) > maxSplitDistanceMeters)
				throw new ConflictError("Split position is too far from the way")
			// Clamped onto a segment end: split at that node instead of adding one
			if (delta === 0 || delta === 1)
				return toNodeSplit(index1 + delta, pos, positions, isClosed)
			return { type: "line", index1, index2: index1 + 1, delta, pos }
		}
		default:
			return assertNever(split)
	}
}

/**
 * Split at an existing node. The closing node of a closed way is the same
 * node as its first one and resolves to index 0.
 */
function toNodeSplit(
	index: number,
	pos: LonLat,
	positions: LonLat[],
	isClosed: boolean,
): SplitWayAt {
	const isLast = index === positions.length - 1
	if (isClosed) return { type: "index", index: isLast ? 0 : index, pos }
	if (index === 0 || isLast)
		throw new ConflictError("Cannot split a way at its first or last node")
	return { type: "index", index, pos }
}

/**
 * Resolve all split requests and sort them from the start to the end of the
 * way. Nodes are inserted in this order, so later indexes can be shifted by
 * the nodes inserted before them.
 *
 * The sort is stable: splits at the same position keep their request order,
 * and only the first of them is kept because splitting twice at one point
 * would create a way with a single node.
 */
export function resolveSplitPositions(
	splits: SplitPolylineAtPosition[],
	positions: LonLat[],
	isClosed: boolean,
	maxSplitDistanceMeters?: number,
): SplitWayAt[] {
	const sorted = splits
		.map((split) =>
			toSplitWayAt(split, positions, isClosed, maxSplitDistanceMeters),
		)
		.sort((a, b) => splitWayAtPosition(a) - splitWayAtPosition(b))
	return sorted.filter((split, index) => {
		const previous = sorted[index - 1]
		return (
			previous == null ||
			splitWayAtPosition(previous) !== splitWayAtPosition(split)
		)
	})
}

/**
 * Index of the first node of the segment between `pos1` and `pos2`, in
 * either direction, or -1.
 */
function findSegment(positions: LonLat[], pos1: LonLat, pos2: LonLat) {
	for (let i = 0; i < positions.length - 1; i++) {
		const a = positions[i]
		const b = positions[i + 1]
		if (a == null || b == null) continue
		if (
			(isLonLatEqual(a, pos1) && isLonLatEqual(b, pos2)) ||
			(isLonLatEqual(a, pos2) && isLonLatEqual(b, pos1))
		)
			return i
	}
	return -1
}
