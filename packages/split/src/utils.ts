/**
 * List helpers for splitting ways and scanning relation members.
 *
 * @module
 */

import type { OsmRelationMember } from "@waysplit/shared/types"

/**
 * Split a list at the given (ascending) indices. Neighbouring chunks share
 * the element at the split index: `[a, b, c, d]` split at `[1]` gives
 * `[[a, b], [b, c, d]]`.
 */
export function splitIntoChunks<T>(list: T[], indices: number[]): T[][] {
	const chunks: T[][] = []
	let lastIndex = 0
	for (const index of indices) {
		chunks.push(list.slice(lastIndex, index + 1))
		lastIndex = index
	}
	chunks.push(list.slice(lastIndex))
	return chunks
}

/**
 * Index of the element with the greatest value. The first one wins a tie.
 * Returns -1 for an empty list.
 */
export function indexOfMaxBy<T>(list: T[], getValue: (item: T) => number) {
	let maxIndex = -1
	let maxValue = Number.NEGATIVE_INFINITY
	list.forEach((item, index) => {
		const value = getValue(item)
		if (value > maxValue) {
			maxValue = value
			maxIndex = index
		}
	})
	return maxIndex
}

/** First and last element, or an empty list for an empty list. */
export function firstAndLast<T>(list: T[]): T[] {
	const first = list[0]
	const last = list.at(-1)
	if (first === undefined || last === undefined) return []
	return list.length === 1 ? [first] : [first, last]
}

/**
 * The nearest member before `index` that matches the predicate.
 */
export function findPreviousMember(
	members: OsmRelationMember[],
	index: number,
	predicate: (member: OsmRelationMember) => boolean,
): OsmRelationMember | undefined {
	for (let i = index - 1; i >= 0; i--) {
		const member = members[i]
		if (member && predicate(member)) return member
	}
}

/**
 * The nearest member after `index` that matches the predicate.
 */
export function findNextMember(
	members: OsmRelationMember[],
	index: number,
	predicate: (member: OsmRelationMember) => boolean,
): OsmRelationMember | undefined {
	for (let i = index + 1; i < members.length; i++) {
		const member = members[i]
		if (member && predicate(member)) return member
	}
}
