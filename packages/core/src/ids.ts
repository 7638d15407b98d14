/**
 * Allocation of IDs for entities created by edits.
 *
 * New entities get negative placeholder IDs, which the upload replaces with
 * the IDs assigned by the server. Each entity type has its own sequence.
 *
 * @module
 */

/**
 * Hands out IDs for new entities. Every call must return an ID that was never
 * returned before and that does not collide with a persisted entity.
 */
export interface ElementIdProvider {
	nextNodeId(): number
	nextWayId(): number
	nextRelationId(): number
}

export interface ElementIdSequenceState {
	currentNodeId: number
	currentWayId: number
	currentRelationId: number
}

/**
 * Counts down from the given start (exclusive) for each entity type.
 */
export class ElementIdSequence implements ElementIdProvider {
	currentNodeId: number
	currentWayId: number
	currentRelationId: number

	static fromJson(json: ElementIdSequenceState) {
		const sequence = new ElementIdSequence()
		sequence.currentNodeId = json.currentNodeId
		sequence.currentWayId = json.currentWayId
		sequence.currentRelationId = json.currentRelationId
		return sequence
	}

	constructor(start = 0) {
		if (start > 0) throw Error("New entity IDs must not be positive")
		this.currentNodeId = start
		this.currentWayId = start
		this.currentRelationId = start
	}

	nextNodeId() {
		return --this.currentNodeId
	}

	nextWayId() {
		return --this.currentWayId
	}

	nextRelationId() {
		return --this.currentRelationId
	}

	toJson(): ElementIdSequenceState {
		return {
			currentNodeId: this.currentNodeId,
			currentWayId: this.currentWayId,
			currentRelationId: this.currentRelationId,
		}
	}
}
