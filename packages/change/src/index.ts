/**
 * @waysplit/change - Changesets for split way edits.
 *
 * Collects the entities returned by edit actions into a changeset on top of
 * the base data, serializes it as OSC XML for upload, or applies it to
 * produce updated map data.
 *
 * @example
 * ```ts
 * import { OsmChangeset } from "@waysplit/change"
 *
 * const changeset = new OsmChangeset(mapData)
 * changeset.addSplitWayUpdates(action.createUpdates(wayId, mapData, ids))
 * const osc = changeset.generateOscChanges()
 * const updated = changeset.applyChanges()
 * ```
 *
 * @module @waysplit/change
 */

export * from "./apply-changeset"
export * from "./changeset"
export * from "./osc"
export * from "./types"
export * from "./utils"
