import type {
	OsmEntity,
	OsmEntityType,
	OsmEntityTypeMap,
	OsmNode,
	OsmRelation,
	OsmWay,
} from "@waysplit/shared/types"
import { isNode, isWay } from "@waysplit/shared/utils"

/**
 * A way together with every node it references.
 */
export interface WayComplete {
	way: OsmWay
	nodes: Map<number, OsmNode>
}

/**
 * Read access to the current state of the map data. Implementations may be
 * backed by a local cache or by the remote API, but each call must answer from
 * one consistent snapshot.
 */
export interface MapDataRepository {
	/** The way and all of its nodes, or `null` if the way does not exist (anymore). */
	getWayComplete(wayId: number): WayComplete | null
	getWay(wayId: number): OsmWay | null
	/** All relations that have the way as a member. */
	getRelationsForWay(wayId: number): OsmRelation[]
}

export interface MapDataInfo {
	id: string
	stats: {
		nodes: number
		ways: number
		relations: number
	}
}

/**
 * In-memory OSM entity store.
 *
 * Entities are stored by ID. Adding an entity with an existing ID replaces it.
 * Stored entities are treated as immutable: getters return the stored objects,
 * and callers that want to change an entity must put a new object.
 */
export class MapData implements MapDataRepository {
	// Filename or ID of this dataset.
	readonly id: string

	readonly nodes = new Map<number, OsmNode>()
	readonly ways = new Map<number, OsmWay>()
	readonly relations = new Map<number, OsmRelation>()

	// Way ID -> IDs of relations that reference the way
	private wayRelations = new Map<number, Set<number>>()

	constructor(id = "unknown", entities: Iterable<OsmEntity> = []) {
		this.id = id
		for (const entity of entities) this.put(entity)
	}

	get info(): MapDataInfo {
		return {
			id: this.id,
			stats: {
				nodes: this.nodes.size,
				ways: this.ways.size,
				relations: this.relations.size,
			},
		}
	}

	addNode(node: OsmNode) {
		this.nodes.set(node.id, node)
	}

	addWay(way: OsmWay) {
		this.ways.set(way.id, way)
	}

	addRelation(relation: OsmRelation) {
		this.removeRelationFromWayIndex(relation.id)
		this.relations.set(relation.id, relation)
		for (const member of relation.members) {
			if (member.type !== "way") continue
			let relationIds = this.wayRelations.get(member.ref)
			if (relationIds == null) {
				relationIds = new Set()
				this.wayRelations.set(member.ref, relationIds)
			}
			relationIds.add(relation.id)
		}
	}

	/**
	 * Add or replace an entity of any type.
	 */
	put(entity: OsmEntity) {
		if (isNode(entity)) this.addNode(entity)
		else if (isWay(entity)) this.addWay(entity)
		else this.addRelation(entity)
	}

	/**
	 * Remove an entity. Returns `true` if it existed.
	 */
	remove(type: OsmEntityType, id: number): boolean {
		switch (type) {
			case "node":
				return this.nodes.delete(id)
			case "way":
				return this.ways.delete(id)
			case "relation":
				this.removeRelationFromWayIndex(id)
				return this.relations.delete(id)
		}
	}

	get<T extends OsmEntityType>(
		type: T,
		id: number,
	): OsmEntityTypeMap[T] | undefined {
		if (type === "node") return this.nodes.get(id) as OsmEntityTypeMap[T]
		if (type === "way") return this.ways.get(id) as OsmEntityTypeMap[T]
		return this.relations.get(id) as OsmEntityTypeMap[T]
	}

	has(type: OsmEntityType, id: number) {
		return this.get(type, id) !== undefined
	}

	getNode(nodeId: number): OsmNode | null {
		return this.nodes.get(nodeId) ?? null
	}

	getWay(wayId: number): OsmWay | null {
		return this.ways.get(wayId) ?? null
	}

	getRelation(relationId: number): OsmRelation | null {
		return this.relations.get(relationId) ?? null
	}

	/**
	 * Nodes that the way references but that are missing from this dataset are
	 * left out of the result. Consumers decide whether that is a conflict.
	 */
	getWayComplete(wayId: number): WayComplete | null {
		const way = this.ways.get(wayId)
		if (way == null) return null
		const nodes = new Map<number, OsmNode>()
		for (const ref of way.refs) {
			const node = this.nodes.get(ref)
			if (node) nodes.set(ref, node)
		}
		return { way, nodes }
	}

	getRelationsForWay(wayId: number): OsmRelation[] {
		const relationIds = this.wayRelations.get(wayId)
		if (relationIds == null) return []
		return Array.from(relationIds)
			.map((id) => this.relations.get(id))
			.filter((relation): relation is OsmRelation => relation != null)
	}

	*[Symbol.iterator](): IterableIterator<OsmEntity> {
		yield* this.nodes.values()
		yield* this.ways.values()
		yield* this.relations.values()
	}

	private removeRelationFromWayIndex(relationId: number) {
		const existing = this.relations.get(relationId)
		if (existing == null) return
		for (const member of existing.members) {
			if (member.type !== "way") continue
			const relationIds = this.wayRelations.get(member.ref)
			relationIds?.delete(relationId)
			if (relationIds?.size === 0) this.wayRelations.delete(member.ref)
		}
	}
}
