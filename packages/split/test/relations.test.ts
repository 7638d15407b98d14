import { MapData } from "@waysplit/core"
import type { ProgressEvent } from "@waysplit/shared/progress"
import type { OsmRelation, OsmWay } from "@waysplit/shared/types"
import { createNodes, createWay } from "@waysplit/test-utils/fixtures"
import { describe, expect, it, vi } from "vitest"
import {
	findVias,
	getViaNodes,
	getWayOrientationInRelation,
	updateRelationsWithNewWays,
} from "../src/relations"

// Way 1 runs through nodes 1 to 5 and is split into the ways below.
const originalWay = createWay(1, [1, 2, 3, 4, 5])
const splitAtNode3: OsmWay[] = [
	createWay(1, [1, 2, 3]),
	createWay(-1, [3, 4, 5], undefined, 0),
]
const splitAtNodes2And4: OsmWay[] = [
	createWay(-1, [1, 2]),
	createWay(1, [2, 3, 4]),
	createWay(-2, [4, 5]),
]

function createMapData(...entities: (OsmWay | OsmRelation)[]) {
	return new MapData("relations", [
		...createNodes([1, 2, 3, 4, 5]),
		originalWay,
		...entities,
	])
}

function updateRelation(
	data: MapData,
	newWays: OsmWay[],
	onProgress?: (event: ProgressEvent) => void,
) {
	const [updated, ...rest] = updateRelationsWithNewWays(
		originalWay,
		newWays,
		data,
		onProgress,
	)
	expect(rest).toEqual([])
	return updated?.members.map((member) => [member.ref, member.role])
}

describe("findVias", () => {
	it("uses the via role", () => {
		const relation: OsmRelation = {
			id: 10,
			tags: { type: "restriction" },
			members: [
				{ type: "way", ref: 1, role: "from" },
				{ type: "node", ref: 5, role: "via" },
				{ type: "relation", ref: 3, role: "via" },
			],
		}
		expect(findVias(relation)).toEqual([{ type: "node", ref: 5, role: "via" }])
	})

	it("prefers the intersection of a destination sign over the sign", () => {
		const members: OsmRelation["members"] = [
			{ type: "node", ref: 5, role: "intersection" },
			{ type: "node", ref: 9, role: "sign" },
		]
		const relation: OsmRelation = {
			id: 10,
			tags: { type: "destination_sign" },
			members,
		}
		expect(findVias(relation).map((m) => m.ref)).toEqual([5])
		expect(
			findVias({ ...relation, members: members.slice(1) }).map((m) => m.ref),
		).toEqual([9])
	})
})

describe("getViaNodes", () => {
	it("uses the first and last node of a via way", () => {
		const via = createWay(30, [5, 40, 41])
		const relation: OsmRelation = {
			id: 10,
			members: [{ type: "way", ref: 30, role: "via" }],
		}
		expect(getViaNodes(relation, (id) => (id === 30 ? via : null))).toEqual({
			type: "via-nodes",
			nodeIds: new Set([5, 41]),
		})
	})

	it("reports a relation without vias", () => {
		expect(getViaNodes({ id: 10, members: [] }, () => null)).toEqual({
			type: "no-via",
		})
	})
})

describe("getWayOrientationInRelation", () => {
	const ways = new Map([
		[7, createWay(7, [9, 5])],
		[8, createWay(8, [1, 8])],
		[9, createWay(9, [5, 20])],
	])
	const getWay = (id: number) => ways.get(id) ?? null

	it("checks the previous way first", () => {
		const members: OsmRelation["members"] = [
			{ type: "way", ref: 7 },
			{ type: "node", ref: 100 },
			{ type: "way", ref: 1 },
			{ type: "way", ref: 9 },
		]
		expect(getWayOrientationInRelation(originalWay, members, 2, getWay)).toBe(
			"backward",
		)
	})

	it("falls back to the next way", () => {
		const members: OsmRelation["members"] = [
			{ type: "way", ref: 1 },
			{ type: "way", ref: 9 },
		]
		expect(getWayOrientationInRelation(originalWay, members, 0, getWay)).toBe(
			"forward",
		)
		const reversed: OsmRelation["members"] = [
			{ type: "way", ref: 1 },
			{ type: "way", ref: 8 },
		]
		expect(getWayOrientationInRelation(originalWay, reversed, 0, getWay)).toBe(
			"backward",
		)
	})

	it("is unknown without connected neighbours", () => {
		expect(
			getWayOrientationInRelation(
				originalWay,
				[{ type: "way", ref: 1 }],
				0,
				getWay,
			),
		).toBe("unknown")
	})
})

describe("updateRelationsWithNewWays", () => {
	it("replaces the from member with the piece touching the via node", () => {
		const data = createMapData(createWay(2, [5, 6]), {
			id: 10,
			tags: { type: "restriction", restriction: "no_left_turn" },
			members: [
				{ type: "way", ref: 1, role: "from" },
				{ type: "node", ref: 5, role: "via" },
				{ type: "way", ref: 2, role: "to" },
			],
		})
		expect(updateRelation(data, splitAtNode3)).toEqual([
			[-1, "from"],
			[5, "via"],
			[2, "to"],
		])
	})

	it("keeps the original way when it touches the via node", () => {
		const data = createMapData({
			id: 10,
			tags: { type: "restriction" },
			members: [
				{ type: "way", ref: 1, role: "from" },
				{ type: "node", ref: 1, role: "via" },
			],
		})
		expect(updateRelation(data, splitAtNode3)).toEqual([
			[1, "from"],
			[1, "via"],
		])
	})

	it("uses the intersection of a destination sign as via", () => {
		const data = createMapData({
			id: 10,
			tags: { type: "destination_sign" },
			members: [
				{ type: "way", ref: 1, role: "to" },
				{ type: "node", ref: 5, role: "intersection" },
				{ type: "node", ref: 1, role: "sign" },
			],
		})
		expect(updateRelation(data, splitAtNode3)?.[0]).toEqual([-1, "to"])
	})

	it("uses the endpoints of a via way", () => {
		const data = createMapData(createWay(30, [1, 31]), {
			id: 10,
			tags: { type: "restriction" },
			members: [
				{ type: "way", ref: 30, role: "via" },
				{ type: "way", ref: 1, role: "to" },
			],
		})
		expect(updateRelation(data, splitAtNodes2And4)).toEqual([
			[30, "via"],
			[-1, "to"],
		])
	})

	it("adds all pieces in the direction of the route", () => {
		const data = createMapData(createWay(7, [9, 5]), {
			id: 10,
			tags: { type: "route", route: "bus" },
			members: [
				{ type: "way", ref: 7, role: "" },
				{ type: "way", ref: 1, role: "" },
			],
		})
		expect(updateRelation(data, splitAtNodes2And4)).toEqual([
			[7, ""],
			[-2, ""],
			[1, ""],
			[-1, ""],
		])
	})

	it("keeps the order of the pieces in unordered relations", () => {
		const data = createMapData({
			id: 10,
			tags: { type: "multipolygon" },
			members: [{ type: "way", ref: 1, role: "outer" }],
		})
		expect(updateRelation(data, splitAtNodes2And4)).toEqual([
			[-1, "outer"],
			[1, "outer"],
			[-2, "outer"],
		])
	})

	it("does not add a role to members without one", () => {
		const data = createMapData({
			id: 10,
			members: [{ type: "way", ref: 1 }],
		})
		const [updated] = updateRelationsWithNewWays(
			originalWay,
			splitAtNode3,
			data,
		)
		expect(updated?.members).toEqual([
			{ type: "way", ref: 1 },
			{ type: "way", ref: -1 },
		])
	})

	it("falls back to all pieces when no piece touches the via", () => {
		const onProgress = vi.fn()
		const data = createMapData(createWay(2, [5, 6]), {
			id: 10,
			tags: { type: "restriction" },
			members: [
				{ type: "way", ref: 1, role: "from" },
				{ type: "way", ref: 2, role: "to" },
			],
		})
		expect(updateRelation(data, splitAtNode3, onProgress)).toEqual([
			[1, "from"],
			[-1, "from"],
			[2, "to"],
		])
		expect(onProgress).toHaveBeenCalledTimes(1)
		const event: ProgressEvent = onProgress.mock.calls[0]?.[0]
		expect(event.detail.level).toBe("warn")
		expect(event.detail.msg).toBe(
			'Relation 10: no piece of way 1 connects to the via, replacing the "from" member with all pieces',
		)
	})

	it("replaces every occurrence of the way", () => {
		const data = createMapData({
			id: 10,
			members: [
				{ type: "way", ref: 1, role: "forward" },
				{ type: "way", ref: 1, role: "backward" },
			],
		})
		expect(updateRelation(data, splitAtNode3)).toEqual([
			[1, "forward"],
			[-1, "forward"],
			[1, "backward"],
			[-1, "backward"],
		])
	})

	it("ignores relations without the way", () => {
		const data = createMapData({
			id: 10,
			members: [{ type: "way", ref: 99 }],
		})
		expect(updateRelationsWithNewWays(originalWay, splitAtNode3, data)).toEqual(
			[],
		)
	})
})
