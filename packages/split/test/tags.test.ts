import { describe, expect, it } from "vitest"
import { removeTagsPotentiallyWrongAfterSplit } from "../src/tags"

describe("removeTagsPotentiallyWrongAfterSplit", () => {
	it("removes counts, capacities and numeric inclines", () => {
		expect(
			removeTagsPotentiallyWrongAfterSplit({
				step_count: "5",
				steps: "5",
				incline: "10%",
				seats: "4",
				capacity: "2",
				"parking:lane:both:capacity": "1",
				name: "Main St",
			}),
		).toEqual({ name: "Main St" })
	})

	it("keeps steps that describe the kind of steps", () => {
		expect(removeTagsPotentiallyWrongAfterSplit({ steps: "spiral" })).toEqual({
			steps: "spiral",
		})
		expect(removeTagsPotentiallyWrongAfterSplit({ steps: "-3" })).toEqual({})
	})

	it("keeps inclines without a number", () => {
		expect(removeTagsPotentiallyWrongAfterSplit({ incline: "up" })).toEqual({
			incline: "up",
		})
	})

	it("removes any key with a capacity part", () => {
		expect(
			removeTagsPotentiallyWrongAfterSplit({
				"capacity:disabled": "2",
				"bicycle_parking:capacity": "10",
				capacitymax: "3",
			}),
		).toEqual({ capacitymax: "3" })
	})

	it("does not change the input", () => {
		const tags = { highway: "steps", step_count: "12" }
		removeTagsPotentiallyWrongAfterSplit(tags)
		expect(tags).toEqual({ highway: "steps", step_count: "12" })
	})
})
