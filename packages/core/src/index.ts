/**
 * @waysplit/core - In-memory OSM map data and element ID allocation.
 *
 * `MapData` stores nodes, ways and relations by ID and answers the queries
 * edit actions need (`getWayComplete`, `getWay`, `getRelationsForWay`).
 * Any other store can be used by implementing `MapDataRepository`.
 *
 * @example
 * ```ts
 * import { ElementIdSequence, MapData } from "@waysplit/core"
 *
 * const data = new MapData("local", [node1, node2, way])
 * const ids = new ElementIdSequence()
 * ids.nextNodeId() // -1
 * ```
 *
 * @module @waysplit/core
 */

export * from "./ids"
export * from "./map-data"
