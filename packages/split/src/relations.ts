/**
 * Update the relations a way is member of after the way was split.
 *
 * Most relations simply get all new ways in place of the original way, in
 * the order they follow each other along the original way's direction in the
 * relation. Relations with "from" and "to" members (turn restrictions,
 * destination signs, ...) must only contain the way that connects to the
 * "via", so only that piece replaces the original way.
 *
 * @module
 */

import type { MapDataRepository } from "@waysplit/core"
import {
	ignoreProgress,
	type ProgressListener,
	progressEvent,
} from "@waysplit/shared/progress"
import type {
	OsmRelation,
	OsmRelationMember,
	OsmWay,
} from "@waysplit/shared/types"
import { wayEndpoints } from "@waysplit/shared/utils"
import { findNextMember, findPreviousMember, firstAndLast } from "./utils"

/** Node IDs that "from" and "to" members must connect to. */
export type ViaNodes =
	| { type: "no-via" }
	| { type: "via-nodes"; nodeIds: Set<number> }

/** Direction of a way relative to the way members around it. */
export type WayOrientation = "forward" | "backward" | "unknown"

type GetWay = (wayId: number) => OsmWay | null

const isWayMember = (member: OsmRelationMember) => member.type === "way"

/**
 * Members that fill the "via" role of a restriction or similar relation.
 * For destination signs that is the "intersection", or else the "sign".
 */
export function findVias(relation: OsmRelation): OsmRelationMember[] {
	const nodesAndWays = relation.members.filter(
		(member) => member.type === "node" || member.type === "way",
	)
	if (relation.tags?.["type"] === "destination_sign") {
		const intersections = nodesAndWays.filter(
			(member) => member.role === "intersection",
		)
		if (intersections.length > 0) return intersections
		return nodesAndWays.filter((member) => member.role === "sign")
	}
	return nodesAndWays.filter((member) => member.role === "via")
}

/**
 * The node IDs of the via(s) of a relation. Usually a single node. A via way
 * contributes its first and last node.
 */
export function getViaNodes(relation: OsmRelation, getWay: GetWay): ViaNodes {
	const nodeIds = new Set<number>()
	for (const via of findVias(relation)) {
		if (via.type === "node") {
			nodeIds.add(via.ref)
		} else {
			const way = getWay(via.ref)
			if (way) for (const id of firstAndLast(way.refs)) nodeIds.add(id)
		}
	}
	if (nodeIds.size === 0) return { type: "no-via" }
	return { type: "via-nodes", nodeIds }
}

/** Whether `way` ends where `other` starts or ends. */
export function isBeforeWayInChain(way: OsmWay, other: OsmWay) {
	const [, last] = wayEndpoints(way)
	const [otherFirst, otherLast] = wayEndpoints(other)
	return last === otherLast || last === otherFirst
}

/** Whether `way` starts where `other` starts or ends. */
export function isAfterWayInChain(way: OsmWay, other: OsmWay) {
	const [first] = wayEndpoints(way)
	const [otherFirst, otherLast] = wayEndpoints(other)
	return first === otherLast || first === otherFirst
}

/**
 * Orientation of the way at `index` relative to its neighbouring way members.
 * The way before it is checked first, then the way after it. If neither
 * connects, the relation is not ordered (or not around this member) and the
 * orientation is unknown.
 */
export function getWayOrientationInRelation(
	way: OsmWay,
	members: OsmRelationMember[],
	index: number,
	getWay: GetWay,
): WayOrientation {
	const memberBefore = findPreviousMember(members, index, isWayMember)
	const wayBefore = memberBefore ? getWay(memberBefore.ref) : null
	if (wayBefore) {
		if (isAfterWayInChain(way, wayBefore)) return "forward"
		if (isBeforeWayInChain(way, wayBefore)) return "backward"
	}

	const memberAfter = findNextMember(members, index, isWayMember)
	const wayAfter = memberAfter ? getWay(memberAfter.ref) : null
	if (wayAfter) {
		if (isBeforeWayInChain(way, wayAfter)) return "forward"
		if (isAfterWayInChain(way, wayAfter)) return "backward"
	}

	return "unknown"
}

/**
 * Members that should replace the member at `index`, which references the
 * original way.
 */
export function getReplacementMembers(
	relation: OsmRelation,
	members: OsmRelationMember[],
	index: number,
	originalWay: OsmWay,
	newWays: OsmWay[],
	getWay: GetWay,
	onProgress: ProgressListener = ignoreProgress,
): OsmRelationMember[] {
	const role = members[index]?.role
	const toMember = (way: OsmWay): OsmRelationMember =>
		role === undefined
			? { type: "way", ref: way.id }
			: { type: "way", ref: way.id, role }

	if (role === "from" || role === "to") {
		const via = getViaNodes(relation, getWay)
		if (via.type === "via-nodes") {
			const connectingWay = newWays.find((way) =>
				firstAndLast(way.refs).some((id) => via.nodeIds.has(id)),
			)
			if (connectingWay) return [toMember(connectingWay)]
		}
		onProgress(
			progressEvent(
				`Relation ${relation.id}: no piece of way ${originalWay.id} connects to the via, replacing the "${role}" member with all pieces`,
				"warn",
			),
		)
	}

	const newMembers = newWays.map(toMember)
	const orientation = getWayOrientationInRelation(
		originalWay,
		members,
		index,
		getWay,
	)
	return orientation === "backward" ? newMembers.reverse() : newMembers
}

/**
 * Replace every member that references the original way in the relation.
 * Returns `null` if the relation does not reference the way.
 *
 * Members are visited from last to first, so a member replaced by several
 * members is never visited again.
 */
export function replaceWayInRelation(
	relation: OsmRelation,
	originalWay: OsmWay,
	newWays: OsmWay[],
	getWay: GetWay,
	onProgress?: ProgressListener,
): OsmRelation | null {
	let members = relation.members
	for (let i = members.length - 1; i >= 0; i--) {
		const member = members[i]
		if (member?.type !== "way" || member.ref !== originalWay.id) continue
		const replacements = getReplacementMembers(
			relation,
			members,
			i,
			originalWay,
			newWays,
			getWay,
			onProgress,
		)
		members = members.toSpliced(i, 1, ...replacements)
	}
	if (members === relation.members) return null
	return { ...relation, members }
}

/**
 * Update all relations the original way is member of to reference the ways
 * it was split into. Returns the updated relations.
 *
 * Ways are looked up among the new ways first: after a way appearing twice
 * in a relation has been replaced once, its pieces are the neighbours of the
 * other occurrence. The original ID still resolves to the whole original way.
 */
export function updateRelationsWithNewWays(
	originalWay: OsmWay,
	newWays: OsmWay[],
	repository: MapDataRepository,
	onProgress?: ProgressListener,
): OsmRelation[] {
	const waysById = new Map(newWays.map((way) => [way.id, way]))
	waysById.set(originalWay.id, originalWay)
	const getWay: GetWay = (wayId) =>
		waysById.get(wayId) ?? repository.getWay(wayId)

	const result: OsmRelation[] = []
	for (const relation of repository.getRelationsForWay(originalWay.id)) {
		const updated = replaceWayInRelation(
			relation,
			originalWay,
			newWays,
			getWay,
			onProgress,
		)
		if (updated) result.push(updated)
	}
	return result
}
