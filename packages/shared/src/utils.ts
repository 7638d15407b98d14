/**
 * General OSM entity utilities.
 *
 * Provides type guards, equality checks, and type detection for OSM entities.
 * Uses deep equality checking for tags, info, and entity-specific properties.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import type {
	LonLat,
	OsmEntity,
	OsmEntityType,
	OsmNode,
	OsmRelation,
	OsmWay,
} from "./types"

/**
 * Check if two entities have equal tags and info.
 */
function isTagsAndInfoEqual(a: OsmEntity, b: OsmEntity) {
	return dequal(a.tags, b.tags) && dequal(a.info, b.info)
}

/** Type guard: check if entity is a Node. */
export function isNode(entity: OsmEntity): entity is OsmNode {
	return "lon" in entity && "lat" in entity
}

/** Check if two nodes are equal (position, tags, and info). */
export function isNodeEqual(a: OsmNode, b: OsmNode) {
	return a.lat === b.lat && a.lon === b.lon && isTagsAndInfoEqual(a, b)
}

/** Type guard: check if entity is a Way. */
export function isWay(entity: OsmEntity): entity is OsmWay {
	return "refs" in entity
}

/** Type guard: check if entity is a Relation. */
export function isRelation(entity: OsmEntity): entity is OsmRelation {
	return "members" in entity
}

/** Check if two ways are equal (refs, tags, and info). */
export function isWayEqual(a: OsmWay, b: OsmWay) {
	return dequal(a.refs, b.refs) && isTagsAndInfoEqual(a, b)
}

/** Check if two relations are equal (members, tags, and info). */
export function isRelationEqual(a: OsmRelation, b: OsmRelation) {
	return dequal(a.members, b.members) && isTagsAndInfoEqual(a, b)
}

/** Check if two entities have equal properties (type-aware comparison). */
export function entityPropertiesEqual(a: OsmEntity, b: OsmEntity) {
	if (isNode(a) && isNode(b)) return isNodeEqual(a, b)
	if (isWay(a) && isWay(b)) return isWayEqual(a, b)
	if (isRelation(a) && isRelation(b)) return isRelationEqual(a, b)
	return false
}

/** Get the entity type ("node", "way", or "relation") for an entity. */
export function getEntityType(entity: OsmEntity): OsmEntityType {
	if (isNode(entity)) return "node"
	if (isWay(entity)) return "way"
	if (isRelation(entity)) return "relation"
	throw Error("Unknown entity type")
}

/**
 * Version of the remote copy of an entity. Entities without info were never uploaded.
 */
export function getEntityVersion(entity: OsmEntity) {
	return entity.info?.version ?? 0
}

/** Node position as a `[lon, lat]` tuple. */
export function nodeLonLat(node: OsmNode): LonLat {
	return [node.lon, node.lat]
}

/** Check if two positions are exactly equal. */
export function isLonLatEqual(a: LonLat, b: LonLat) {
	return a[0] === b[0] && a[1] === b[1]
}

/**
 * A way is closed when its first and last node are the same node.
 */
export function isClosedWay(way: OsmWay) {
	return way.refs.length > 1 && way.refs[0] === way.refs.at(-1)
}

/** First and last node ID of a way. */
export function wayEndpoints(way: OsmWay): [first: number, last: number] {
	const first = way.refs[0]
	const last = way.refs.at(-1)
	if (first === undefined || last === undefined)
		throw Error(`Way ${way.id} has no nodes`)
	return [first, last]
}
