import type { OsmTags } from "@waysplit/shared/types"

const DIGIT = /[0-9]/
const INTEGER = /^[+-]?\d+$/

// "capacity", "bicycle_parking:capacity", "parking:lane:both:capacity",
// "parking:lane:right:capacity:disabled", ...
const CAPACITY_KEY = /^(.*:)?capacity(:.*)?$/

/**
 * Tags that describe the whole way and are likely wrong for each piece once
 * the way is split. Returns a new tags object.
 */
export function removeTagsPotentiallyWrongAfterSplit(tags: OsmTags): OsmTags {
	const result: OsmTags = {}
	for (const [key, value] of Object.entries(tags)) {
		if (isPotentiallyWrongAfterSplit(key, value)) continue
		result[key] = value
	}
	return result
}

function isPotentiallyWrongAfterSplit(key: string, value: string) {
	switch (key) {
		case "step_count":
		case "seats":
			return true
		// "steps" is also used for the kind of steps
		case "steps":
			return INTEGER.test(value)
		// "incline" may also be "up" or "down"
		case "incline":
			return DIGIT.test(value)
		default:
			return CAPACITY_KEY.test(key)
	}
}
