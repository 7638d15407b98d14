import type { MapData } from "@waysplit/core"
import type {
	OsmEntity,
	OsmEntityType,
	OsmEntityTypeMap,
} from "@waysplit/shared/types"
import { entityPropertiesEqual, getEntityType } from "@waysplit/shared/utils"
import type { SplitWayUpdates } from "@waysplit/split"
import { applyChangesetToMapData } from "./apply-changeset"
import { generateOscChanges, type OscOptions } from "./osc"
import type { OsmChange, OsmChanges, OsmChangesetStats } from "./types"

/**
 * Collects the changes of one or more edits on top of a base dataset, ready to
 * be uploaded or applied.
 *
 * Changes are keyed by entity ID, so a later change of the same entity
 * replaces an earlier one. An entity created in this changeset stays a
 * "create" when it is modified again.
 */
export class OsmChangeset {
	nodeChanges: Record<number, OsmChange<OsmEntityTypeMap["node"]>> = {}
	wayChanges: Record<number, OsmChange<OsmEntityTypeMap["way"]>> = {}
	relationChanges: Record<number, OsmChange<OsmEntityTypeMap["relation"]>> = {}

	base: MapData

	splitWays = 0

	static fromJson(base: MapData, json: OsmChanges) {
		const changeset = new OsmChangeset(base)
		changeset.nodeChanges = json.nodes
		changeset.wayChanges = json.ways
		changeset.relationChanges = json.relations
		changeset.splitWays = json.splitWays
		return changeset
	}

	constructor(base: MapData) {
		this.base = base
	}

	get stats(): OsmChangesetStats {
		const nodeChanges = Object.values(this.nodeChanges).length
		const wayChanges = Object.values(this.wayChanges).length
		const relationChanges = Object.values(this.relationChanges).length
		return {
			osmId: this.base.id,
			totalChanges: nodeChanges + wayChanges + relationChanges,
			nodeChanges,
			wayChanges,
			relationChanges,
			splitWays: this.splitWays,
		}
	}

	changes<T extends OsmEntityType>(
		type: T,
	): Record<number, OsmChange<OsmEntityTypeMap[T]>> {
		switch (type) {
			case "node":
				return this.nodeChanges as Record<
					number,
					OsmChange<OsmEntityTypeMap[T]>
				>
			case "way":
				return this.wayChanges as Record<number, OsmChange<OsmEntityTypeMap[T]>>
			default:
				return this.relationChanges as Record<
					number,
					OsmChange<OsmEntityTypeMap[T]>
				>
		}
	}

	/**
	 * Current state of an entity: the changed version if there is one, else the
	 * version in the base data. `undefined` if it does not exist or is deleted.
	 */
	getEntity<T extends OsmEntityType>(
		type: T,
		id: number,
	): OsmEntityTypeMap[T] | undefined {
		const change = this.changes(type)[id]
		if (change) return change.changeType === "delete" ? undefined : change.entity
		return this.base.get(type, id)
	}

	create(entity: OsmEntity) {
		const type = getEntityType(entity)
		if (this.base.has(type, entity.id))
			throw Error(`Cannot create ${type} ${entity.id}, it already exists`)
		this.changes(type)[entity.id] = {
			changeType: "create",
			entity,
		}
	}

	/**
	 * Record the new state of an entity that exists in the base data or was
	 * created in this changeset. Unchanged entities are not recorded.
	 */
	modify(entity: OsmEntity) {
		const type = getEntityType(entity)
		const changes = this.changes(type)
		const change = changes[entity.id]
		if (change?.changeType === "delete")
			throw Error(
				`Cannot modify ${type} ${entity.id}, it is scheduled for deletion`,
			)
		if (change?.changeType === "create") {
			changes[entity.id] = { changeType: "create", entity }
			return
		}

		const oldEntity = this.base.get(type, entity.id)
		if (oldEntity == null)
			throw Error(`Cannot modify ${type} ${entity.id}, it does not exist`)
		if (entityPropertiesEqual(oldEntity, entity)) {
			delete changes[entity.id]
			return
		}
		changes[entity.id] = { changeType: "modify", entity, oldEntity }
	}

	delete(entity: OsmEntity) {
		const type = getEntityType(entity)
		const changes = this.changes(type)
		if (changes[entity.id]?.changeType === "create") {
			delete changes[entity.id]
			return
		}
		const oldEntity = this.base.get(type, entity.id)
		if (oldEntity == null)
			throw Error(`Cannot delete ${type} ${entity.id}, it does not exist`)
		changes[entity.id] = { changeType: "delete", entity, oldEntity }
	}

	/**
	 * Record an entity that was either changed or newly created.
	 */
	upsert(entity: OsmEntity) {
		const type = getEntityType(entity)
		if (this.base.has(type, entity.id) || this.changes(type)[entity.id]) {
			this.modify(entity)
		} else {
			this.create(entity)
		}
	}

	/**
	 * Record the result of splitting a way: new nodes are created, the way
	 * keeping the original ID is modified and the other ways are created.
	 */
	addSplitWayUpdates({
		createdNodes,
		updatedWays,
		updatedRelations,
	}: SplitWayUpdates) {
		for (const node of createdNodes) this.create(node)
		for (const way of updatedWays) this.upsert(way)
		for (const relation of updatedRelations) this.upsert(relation)
		this.splitWays++
	}

	toJson(): OsmChanges {
		return {
			osmId: this.base.id,
			nodes: this.nodeChanges,
			ways: this.wayChanges,
			relations: this.relationChanges,
			splitWays: this.splitWays,
		}
	}

	applyChanges(newId?: string) {
		return applyChangesetToMapData(this, newId)
	}

	/**
	 * Generate OSC (OSM Change) XML format string from this changeset.
	 */
	generateOscChanges(options?: Partial<OscOptions>) {
		return generateOscChanges(this, options)
	}
}
