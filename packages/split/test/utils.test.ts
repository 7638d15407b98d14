import type { OsmRelationMember } from "@waysplit/shared/types"
import { describe, expect, it } from "vitest"
import {
	findNextMember,
	findPreviousMember,
	firstAndLast,
	indexOfMaxBy,
	splitIntoChunks,
} from "../src/utils"

describe("splitIntoChunks", () => {
	it("shares the element at each split index", () => {
		expect(splitIntoChunks(["a", "b", "c", "d"], [1])).toEqual([
			["a", "b"],
			["b", "c", "d"],
		])
		expect(splitIntoChunks([1, 2, 3, 4, 5], [1, 3])).toEqual([
			[1, 2],
			[2, 3, 4],
			[4, 5],
		])
	})

	it("returns the whole list without split indices", () => {
		expect(splitIntoChunks([1, 2, 3], [])).toEqual([[1, 2, 3]])
	})

	it("produces single element chunks at the ends", () => {
		expect(splitIntoChunks([1, 2, 3], [0])).toEqual([[1], [1, 2, 3]])
		expect(splitIntoChunks([1, 2, 3], [2])).toEqual([[1, 2, 3], [3]])
	})
})

describe("indexOfMaxBy", () => {
	it("finds the greatest value, preferring the first", () => {
		expect(indexOfMaxBy([[1], [1, 2, 3], [4, 5, 6]], (l) => l.length)).toBe(1)
		expect(indexOfMaxBy([2, 7, 7], (n) => n)).toBe(1)
		expect(indexOfMaxBy([], (n: number) => n)).toBe(-1)
	})
})

describe("firstAndLast", () => {
	it("returns the ends of a list", () => {
		expect(firstAndLast([1, 2, 3])).toEqual([1, 3])
		expect(firstAndLast([1])).toEqual([1])
		expect(firstAndLast([])).toEqual([])
	})
})

describe("members", () => {
	const members: OsmRelationMember[] = [
		{ type: "way", ref: 1 },
		{ type: "node", ref: 2 },
		{ type: "way", ref: 3 },
		{ type: "node", ref: 4 },
	]
	const isWay = (member: OsmRelationMember) => member.type === "way"

	it("finds the nearest matching member before an index", () => {
		expect(findPreviousMember(members, 2, isWay)?.ref).toBe(1)
		expect(findPreviousMember(members, 0, isWay)).toBeUndefined()
	})

	it("finds the nearest matching member after an index", () => {
		expect(findNextMember(members, 0, isWay)?.ref).toBe(3)
		expect(findNextMember(members, 2, isWay)).toBeUndefined()
	})
})
