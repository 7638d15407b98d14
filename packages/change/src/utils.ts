/**
 * Utility functions for changeset output.
 *
 * @module
 */

import type { OsmTags } from "@waysplit/shared/types"
import type { OsmChangesetStats } from "./types"

const XML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
}

/**
 * Escape a string for use in an XML attribute value.
 */
export function escapeXmlAttribute(value: string) {
	return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char)
}

/**
 * Convert OSM tags object to OSC XML tag elements.
 * @returns XML string of `<tag k="..." v="..." />` elements.
 */
export function osmTagsToOscTags(tags: OsmTags): string {
	return Object.entries(tags)
		.map(([key, value]) => {
			return `<tag k="${escapeXmlAttribute(key)}" v="${escapeXmlAttribute(value)}" />`
		})
		.join("")
}

/**
 * Convert camelCase string to sentence case.
 * @returns The string in sentence case (e.g., "splitWays" -> "split ways").
 */
export function camelCaseToSentenceCase(str: string) {
	return str
		.replace(/([A-Z])/g, " $1")
		.trim()
		.toLowerCase()
}

/**
 * Summarize the changeset stats with the most significant changes first.
 */
export function changeStatsSummary(stats: OsmChangesetStats) {
	const numericStats = Object.entries(stats).filter(
		(entry): entry is [string, number] =>
			typeof entry[1] === "number" && entry[1] > 0,
	)
	if (numericStats.length === 0) return "Changeset is empty."
	const sortedNumericStats = [...numericStats]
		.sort((a, b) => b[1] - a[1])
		.map(([key, value]) => ` ${camelCaseToSentenceCase(key)}: ${value}`)
	return `Changeset summary: ${sortedNumericStats.join(",")}`
}
