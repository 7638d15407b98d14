/**
 * Type definitions for changesets.
 * @module
 */

import type {
	OsmEntity,
	OsmEntityTypeMap,
} from "@waysplit/shared/types"

/** The type of change being tracked. */
export type OsmChangeTypes = "modify" | "create" | "delete"

/**
 * A single change record for an OSM entity.
 *
 * For augmented diffs (see https://wiki.openstreetmap.org/wiki/Overpass_API/Augmented_Diffs),
 * the `oldEntity` field contains the previous state of the entity for "modify" and "delete"
 * operations.
 */
export type OsmChange<T extends OsmEntity = OsmEntity> = {
	changeType: OsmChangeTypes
	entity: T

	/**
	 * The state of the entity in the base data before the change.
	 * Undefined for "create" operations.
	 */
	oldEntity?: T
}

/**
 * Statistics from a changeset.
 */
export type OsmChangesetStats = {
	osmId: string
	totalChanges: number
	nodeChanges: number
	wayChanges: number
	relationChanges: number
	splitWays: number
}

/**
 * Serializable representation of all changes in a changeset.
 */
export type OsmChanges = {
	osmId: string
	nodes: Record<number, OsmChange<OsmEntityTypeMap["node"]>>
	ways: Record<number, OsmChange<OsmEntityTypeMap["way"]>>
	relations: Record<number, OsmChange<OsmEntityTypeMap["relation"]>>
	splitWays: number
}
