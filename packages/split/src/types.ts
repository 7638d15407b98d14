/**
 * Type definitions for splitting ways.
 * @module
 */

import type { ProgressListener } from "@waysplit/shared/progress"
import type {
	LonLat,
	OsmNode,
	OsmRelation,
	OsmTags,
	OsmWay,
} from "@waysplit/shared/types"

/**
 * Where a way should be split, as requested by the user.
 *
 * Split positions are geographic positions rather than node IDs or indexes so
 * that a split can still be placed correctly after the way was changed
 * remotely (for example reversed, or nodes were added elsewhere).
 */
export type SplitPolylineAtPosition =
	/** Split at the existing node at `pos`. */
	| { type: "point"; pos: LonLat }
	/**
	 * Split on the segment between the adjacent nodes at `pos1` and `pos2`, at
	 * the point of that segment nearest to `pos`. A new node is created there.
	 */
	| { type: "line"; pos1: LonLat; pos2: LonLat; pos: LonLat }

/**
 * A split position resolved against the node list of a way.
 */
export type SplitWayAt =
	/** Split at the existing node `index`. */
	| { type: "index"; index: number; pos: LonLat }
	/**
	 * Insert a new node at `pos` between the nodes `index1` and `index2`
	 * (`index2 === index1 + 1`) and split there. `delta` is the fraction of the
	 * segment from `index1` to the new node.
	 */
	| {
			type: "line"
			index1: number
			index2: number
			delta: number
			pos: LonLat
	  }

/**
 * Number of new entities an edit will create. Known before the edit is
 * applied, so IDs can be reserved up front.
 */
export interface NewElementsCount {
	nodes: number
	ways: number
	relations: number
}

/**
 * Everything that changes when a way is split.
 */
export interface SplitWayUpdates {
	/** Nodes inserted into the way where it was split between two nodes. */
	createdNodes: OsmNode[]
	/** All resulting ways in order along the way. One of them keeps the original ID. */
	updatedWays: OsmWay[]
	/** Relations in which the original way was replaced by the new ways. */
	updatedRelations: OsmRelation[]
}

export interface SplitWayOptions {
	/**
	 * Maximum distance in meters between a requested line split position and
	 * the point on the way segment where the new node is placed.
	 *
	 * @default Number.POSITIVE_INFINITY
	 */
	maxSplitDistanceMeters: number
	/**
	 * Returns the tags for the resulting ways, given the tags of the original way.
	 *
	 * @default removeTagsPotentiallyWrongAfterSplit
	 */
	removeTagsAfterSplit: (tags: OsmTags) => OsmTags
	/** @default logProgress */
	onProgress: ProgressListener
}

/**
 * Serializable form of a `SplitWayAction`, for storing pending edits.
 */
export interface SplitWayActionJson {
	splits: SplitPolylineAtPosition[]
	originalWayFirstNodeId: number
	originalWayLastNodeId: number
}
