/**
 * @waysplit/split - Split OSM ways and repair the relations that reference them.
 *
 * Splitting happens in steps, each usable on its own:
 * - **Resolve**: match requested split positions to the way's nodes (`resolveSplitPositions`).
 * - **Partition**: insert new nodes and cut the way into pieces (`insertSplitNodes`, `splitWayAtIndices`).
 * - **Repair**: replace the way in its relations (`updateRelationsWithNewWays`).
 *
 * `SplitWayAction` runs all steps against the current map data and rejects
 * the split with a `ConflictError` if the way changed in an incompatible way.
 *
 * @example
 * ```ts
 * import { SplitWayAction } from "@waysplit/split"
 *
 * const action = new SplitWayAction(splits, firstNodeId, lastNodeId)
 * const updates = action.createUpdates(wayId, mapData, idProvider)
 * ```
 *
 * @module @waysplit/split
 */

export * from "./errors"
export * from "./relations"
export * from "./settings"
export * from "./split-position"
export * from "./split-way"
export * from "./split-way-action"
export * from "./tags"
export * from "./types"
export * from "./utils"
