import type { ElementIdProvider, MapDataRepository } from "@waysplit/core"
import { progressEvent } from "@waysplit/shared/progress"
import { isClosedWay, wayEndpoints } from "@waysplit/shared/utils"
import { dequal } from "dequal/lite"
import { ConflictError } from "./errors"
import { updateRelationsWithNewWays } from "./relations"
import { DEFAULT_SPLIT_WAY_OPTIONS } from "./settings"
import { getWayPositions, resolveSplitPositions } from "./split-position"
import { insertSplitNodes, splitWayAtIndices } from "./split-way"
import type {
	NewElementsCount,
	SplitPolylineAtPosition,
	SplitWayActionJson,
	SplitWayOptions,
	SplitWayUpdates,
} from "./types"

/**
 * Split a way at one or more positions.
 *
 * The original way's first and last node IDs are captured when the split is
 * proposed. When the split is applied, the current way must still start and
 * end at these nodes (or be exactly reversed). If it was shortened or extended,
 * someone may already have split it near the same spot, so the conflict is
 * left to the caller.
 *
 * The action itself never modifies the repository. `createUpdates` either
 * returns every new and changed entity or throws a `ConflictError`.
 *
 * @example
 * ```ts
 * const action = new SplitWayAction(
 *   [{ type: "point", pos: [13.4049, 52.5201] }],
 *   way.refs[0],
 *   way.refs.at(-1),
 * )
 * const { createdNodes, updatedWays, updatedRelations } = action.createUpdates(
 *   way.id,
 *   mapData,
 *   new ElementIdSequence(),
 * )
 * ```
 */
export class SplitWayAction {
	readonly splits: SplitPolylineAtPosition[]
	readonly originalWayFirstNodeId: number
	readonly originalWayLastNodeId: number

	static fromJson(json: SplitWayActionJson) {
		return new SplitWayAction(
			json.splits,
			json.originalWayFirstNodeId,
			json.originalWayLastNodeId,
		)
	}

	constructor(
		splits: SplitPolylineAtPosition[],
		originalWayFirstNodeId: number,
		originalWayLastNodeId: number,
	) {
		if (splits.length === 0)
			throw Error("At least one split position is required")
		this.splits = splits
		this.originalWayFirstNodeId = originalWayFirstNodeId
		this.originalWayLastNodeId = originalWayLastNodeId
	}

	/**
	 * IDs to allocate for this action: at most one node per line split (none
	 * if it lands on an existing node) and one way per split. The way is split
	 * into one more piece than that, but one piece keeps the ID of the
	 * original way.
	 */
	get newElementsCount(): NewElementsCount {
		return {
			nodes: this.splits.filter((split) => split.type === "line").length,
			ways: this.splits.length,
			relations: 0,
		}
	}

	/**
	 * Split the current version of the way and update its relations.
	 *
	 * @throws ConflictError if the way was deleted, changed incompatibly, or a
	 * split position cannot be found on it anymore.
	 */
	createUpdates(
		wayId: number,
		repository: MapDataRepository,
		idProvider: ElementIdProvider,
		options: Partial<SplitWayOptions> = {},
	): SplitWayUpdates {
		const { maxSplitDistanceMeters, removeTagsAfterSplit, onProgress } = {
			...DEFAULT_SPLIT_WAY_OPTIONS,
			...options,
		}

		onProgress(
			progressEvent(
				`Splitting way ${wayId} at ${this.splits.length} position(s)`,
			),
		)
		const completeWay = repository.getWayComplete(wayId)
		if (completeWay == null)
			throw new ConflictError(`Way ${wayId} has been deleted`)

		const way = completeWay.way
		if (!this.hasOriginalEndpoints(wayEndpoints(way)))
			throw new ConflictError(
				`Way ${wayId} has been changed and the conflict cannot be solved automatically`,
			)

		const isClosed = isClosedWay(way)
		if (isClosed && this.splits.length < 2)
			throw new ConflictError(
				"Must specify at least two split positions for a closed way",
			)

		// Splits are sorted from start to end of the way because nodes may be inserted
		const sortedSplits = resolveSplitPositions(
			this.splits,
			getWayPositions(completeWay),
			isClosed,
			maxSplitDistanceMeters,
		)
		if (isClosed && sortedSplits.length < 2)
			throw new ConflictError(
				"Must specify at least two distinct split positions for a closed way",
			)

		const { way: extendedWay, createdNodes, splitAtIndices } = insertSplitNodes(
			way,
			sortedSplits,
			idProvider,
		)
		onProgress(
			progressEvent(
				`Inserted ${createdNodes.length} node(s) into way ${wayId}, splitting at ${splitAtIndices.length} node(s)`,
			),
		)

		const updatedWays = splitWayAtIndices(
			extendedWay,
			splitAtIndices,
			idProvider,
			removeTagsAfterSplit,
		)
		onProgress(
			progressEvent(`Split way ${wayId} into ${updatedWays.length} ways`),
		)

		const updatedRelations = updateRelationsWithNewWays(
			extendedWay,
			updatedWays,
			repository,
			onProgress,
		)
		onProgress(
			progressEvent(
				`Updated ${updatedRelations.length} relation(s) of way ${wayId}`,
			),
		)

		return { createdNodes, updatedWays, updatedRelations }
	}

	/**
	 * The way may have been reversed, but must still start and end at the
	 * original nodes.
	 */
	private hasOriginalEndpoints([first, last]: [number, number]) {
		return (
			(first === this.originalWayFirstNodeId &&
				last === this.originalWayLastNodeId) ||
			(first === this.originalWayLastNodeId &&
				last === this.originalWayFirstNodeId)
		)
	}

	isEqual(other: SplitWayAction) {
		return dequal(this.toJson(), other.toJson())
	}

	toJson(): SplitWayActionJson {
		return {
			splits: this.splits,
			originalWayFirstNodeId: this.originalWayFirstNodeId,
			originalWayLastNodeId: this.originalWayLastNodeId,
		}
	}
}
