/**
 * Changeset application utilities.
 *
 * Applies accumulated changes from an OsmChangeset to produce a new MapData
 * with all creates, modifies, and deletes applied. The base data is not
 * changed.
 *
 * @module
 */

import { MapData } from "@waysplit/core"
import type { OsmEntityType } from "@waysplit/shared/types"
import type { OsmChangeset } from "./changeset"
import type { OsmChange } from "./types"

/**
 * Apply a changeset to its base data, producing new map data.
 *
 * @param changeset - The changeset to apply (contains reference to the base data).
 * @param newId - Optional ID for the new data (defaults to the base ID).
 * @throws If the changeset creates an entity that exists in the base data, or
 * modifies or deletes one that does not.
 *
 * @example
 * ```ts
 * const changeset = new OsmChangeset(mapData)
 * changeset.addSplitWayUpdates(action.createUpdates(wayId, mapData, ids))
 * const updated = applyChangesetToMapData(changeset)
 * ```
 */
export function applyChangesetToMapData(
	changeset: OsmChangeset,
	newId?: string,
): MapData {
	const base = changeset.base
	const result = new MapData(newId ?? base.id, base)
	applyChanges(result, base, "node", changeset.nodeChanges)
	applyChanges(result, base, "way", changeset.wayChanges)
	applyChanges(result, base, "relation", changeset.relationChanges)
	return result
}

function applyChanges(
	result: MapData,
	base: MapData,
	type: OsmEntityType,
	changes: Record<number, OsmChange>,
) {
	for (const { changeType, entity } of Object.values(changes)) {
		const exists = base.has(type, entity.id)
		if (changeType === "create") {
			if (exists)
				throw Error(`Changeset creates ${type} ${entity.id}, which already exists`)
			result.put(entity)
		} else if (!exists) {
			throw Error(`Changeset changes ${type} ${entity.id}, which does not exist`)
		} else if (changeType === "modify") {
			result.put(entity)
		} else {
			result.remove(type, entity.id)
		}
	}
}
