export type LonLat = [lon: number, lat: number]
export type XY = [x: number, y: number]
export interface ILonLat {
	lon: number
	lat: number
}

/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

export interface OsmEntityTypeMap extends Record<OsmEntityType, IOsmEntity> {
	node: OsmNode
	way: OsmWay
	relation: OsmRelation
}

export interface OsmInfoParsed {
	// Revision counter of the remote copy, 0 for entities that were never uploaded
	version?: number
	timestamp?: number
	changeset?: number
	uid?: number
	user?: string
}

export interface OsmTags {
	[key: string]: string
}

export interface IOsmEntity {
	// Positive IDs are persisted entities, new entities get placeholder IDs until uploaded
	id: number
	info?: OsmInfoParsed
	tags?: OsmTags
}

export interface OsmNode extends IOsmEntity, ILonLat {}

export interface OsmWay extends IOsmEntity {
	// OSM IDs of the nodes that make up this way
	refs: number[]
}

export interface OsmRelationMember {
	type: OsmEntityType
	ref: number
	role?: string
}

export interface OsmRelation extends IOsmEntity {
	members: OsmRelationMember[]
}

export type OsmEntity = OsmNode | OsmWay | OsmRelation
