import { MapData } from "@waysplit/core"
import type {
	LonLat,
	OsmNode,
	OsmTags,
	OsmWay,
} from "@waysplit/shared/types"

// Nodes are laid out along the equator, NODE_SPACING degrees apart.
export const NODE_SPACING = 0.001

/** Position of the node at `index` of a fixture way. */
export function lonLatAt(index: number, lat = 0): LonLat {
	return [index * NODE_SPACING, lat]
}

/** Position halfway between the nodes at `index` and `index + 1`. */
export function midpointAfter(index: number, lat = 0): LonLat {
	return [(index + 0.5) * NODE_SPACING, lat]
}

/**
 * One node per ID, in a line from west to east. The node at position `i` of
 * the list is at `lonLatAt(i)`.
 */
export function createNodes(ids: number[], lat = 0): OsmNode[] {
	return ids.map((id, index) => {
		const [lon] = lonLatAt(index, lat)
		return { id, lon, lat }
	})
}

export function createWay(
	id: number,
	refs: number[],
	tags?: OsmTags,
	version = 1,
): OsmWay {
	return tags
		? { id, refs, tags, info: { version } }
		: { id, refs, info: { version } }
}

/**
 * Map data with a single way through the given nodes, laid out from west to
 * east. For a closed way pass the first node ID again at the end; it is not
 * given a second position.
 */
export function createLineMapData(
	wayId: number,
	nodeIds: number[],
	tags?: OsmTags,
): MapData {
	const uniqueIds = nodeIds.filter((id, index) => nodeIds.indexOf(id) === index)
	return new MapData("fixture", [
		...createNodes(uniqueIds),
		createWay(wayId, nodeIds, tags),
	])
}
