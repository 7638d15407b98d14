/**
 * Partition a way into several ways.
 *
 * @module
 */

import type { ElementIdProvider } from "@waysplit/core"
import { assertNever, assertValue } from "@waysplit/shared/assert"
import type { OsmNode, OsmTags, OsmWay } from "@waysplit/shared/types"
import { removeTagsPotentiallyWrongAfterSplit } from "./tags"
import type { SplitWayAt } from "./types"
import { indexOfMaxBy, splitIntoChunks } from "./utils"

export interface SplitNodesResult {
	/** Copy of the way with the new nodes inserted. */
	way: OsmWay
	createdNodes: OsmNode[]
	/** Node indexes of the extended way to split at, ascending. */
	splitAtIndices: number[]
}

/**
 * Create the nodes for splits between two existing nodes and insert them into
 * a copy of the way. The splits must be sorted from start to end of the way:
 * each inserted node shifts the indexes of all following splits by one.
 */
export function insertSplitNodes(
	way: OsmWay,
	sortedSplits: SplitWayAt[],
	idProvider: ElementIdProvider,
): SplitNodesResult {
	const refs = [...way.refs]
	const createdNodes: OsmNode[] = []
	const splitAtIndices: number[] = []
	let insertedNodeCount = 0

	for (const split of sortedSplits) {
		switch (split.type) {
			case "index":
				splitAtIndices.push(split.index + insertedNodeCount)
				break
			case "line": {
				const node: OsmNode = {
					id: idProvider.nextNodeId(),
					lon: split.pos[0],
					lat: split.pos[1],
				}
				createdNodes.push(node)

				const nodeIndex = split.index2 + insertedNodeCount
				refs.splice(nodeIndex, 0, node.id)
				splitAtIndices.push(nodeIndex)
				insertedNodeCount++
				break
			}
			default:
				assertNever(split)
		}
	}

	return { way: { ...way, refs }, createdNodes, splitAtIndices }
}

/**
 * Split the way at the given node indexes. Returns the resulting ways in order
 * along the way.
 *
 * Instead of deleting the original way and creating a way for each chunk, the
 * chunk with the most nodes keeps the ID and version of the original way so
 * that it inherits its history. All chunks get the same tags, minus those
 * removed by `removeTagsAfterSplit`.
 */
export function splitWayAtIndices(
	way: OsmWay,
	splitIndices: number[],
	idProvider: ElementIdProvider,
	removeTagsAfterSplit: (
		tags: OsmTags,
	) => OsmTags = removeTagsPotentiallyWrongAfterSplit,
): OsmWay[] {
	const chunks = splitIntoChunks(way.refs, splitIndices)
	mergeChunksAcrossClosingNode(chunks)

	for (const refs of chunks) {
		if (refs.length < 2)
			throw Error(`Splitting way ${way.id} would produce a way with a single node`)
	}

	const indexOfChunkToKeep = indexOfMaxBy(chunks, (refs) => refs.length)
	const tags = way.tags ? removeTagsAfterSplit(way.tags) : undefined

	return chunks.map((refs, index) => {
		if (index === indexOfChunkToKeep) return withTags({ ...way, refs }, tags)
		return withTags(
			{ id: idProvider.nextWayId(), refs, info: { version: 0 } },
			tags,
		)
	})
}

/**
 * A closed way split at two nodes should be split at exactly these nodes, not
 * also where it starts and ends. If the last chunk ends where the first chunk
 * begins, the last chunk is prepended to the first one.
 */
function mergeChunksAcrossClosingNode(chunks: number[][]) {
	if (chunks.length < 2) return
	const firstChunk = chunks[0]
	const lastChunk = chunks.at(-1)
	assertValue(firstChunk)
	assertValue(lastChunk)
	if (firstChunk[0] !== lastChunk.at(-1)) return

	chunks.pop()
	firstChunk.unshift(...lastChunk.slice(0, -1))
}

function withTags(way: OsmWay, tags?: OsmTags): OsmWay {
	const { tags: _, ...rest } = way
	return tags ? { ...rest, tags: { ...tags } } : rest
}
