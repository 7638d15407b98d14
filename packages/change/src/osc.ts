/**
 * OSC (OSM Change) XML generation.
 *
 * Converts changeset data into the standard OSC XML format used by
 * OpenStreetMap for change uploads and auditing.
 *
 * Supports augmented diffs (https://wiki.openstreetmap.org/wiki/Overpass_API/Augmented_Diffs)
 * which include both old and new versions of modified/deleted elements.
 *
 * @module
 */

import type {
	OsmEntity,
	OsmNode,
	OsmRelation,
	OsmWay,
} from "@waysplit/shared/types"
import { getEntityVersion } from "@waysplit/shared/utils"
import type { OsmChangeset } from "./changeset"
import type { OsmChange } from "./types"
import { escapeXmlAttribute, osmTagsToOscTags } from "./utils"

/**
 * Entities that exist on the server are identified by ID and version.
 */
function idAttributes(entity: OsmEntity) {
	const version = getEntityVersion(entity)
	return version > 0
		? `id="${entity.id}" version="${version}"`
		: `id="${entity.id}"`
}

function nodeToXml(node: OsmNode): string {
	const tags = node.tags ? osmTagsToOscTags(node.tags) : ""
	return `<node ${idAttributes(node)} lon="${node.lon}" lat="${node.lat}">${tags}</node>`
}

function wayToXml(way: OsmWay): string {
	const tags = way.tags ? osmTagsToOscTags(way.tags) : ""
	const nodes = way.refs.map((ref) => `<nd ref="${ref}" />`).join("")
	return `<way ${idAttributes(way)}>${tags}${nodes}</way>`
}

function relationToXml(relation: OsmRelation): string {
	const tags = relation.tags ? osmTagsToOscTags(relation.tags) : ""
	const members = relation.members
		.map(
			(member) =>
				`<member type="${member.type}" ref="${member.ref}"${member.role ? ` role="${escapeXmlAttribute(member.role)}"` : ""} />`,
		)
		.join("")
	return `<relation ${idAttributes(relation)}>${tags}${members}</relation>`
}

/**
 * Options for OSC generation.
 */
export interface OscOptions {
	/**
	 * When true, generates augmented diffs that include both old and new
	 * versions of modified/deleted elements using `<old>` and `<new>` sections.
	 *
	 * @default false
	 */
	augmented: boolean
	/**
	 * Value of the `generator` attribute of the `<osmChange>` element.
	 *
	 * @default "waysplit"
	 */
	generator: string
}

const DEFAULT_OSC_OPTIONS: OscOptions = {
	augmented: false,
	generator: "waysplit",
}

interface OscSections {
	create: string
	modify: string
	delete: string
}

function addChanges<T extends OsmEntity>(
	sections: OscSections,
	changes: Record<number, OsmChange<T>>,
	type: string,
	toXml: (entity: T) => string,
	augmented: boolean,
) {
	for (const change of Object.values(changes)) {
		if (change.changeType === "create") {
			sections.create += toXml(change.entity)
		} else if (change.changeType === "modify") {
			if (augmented && change.oldEntity) {
				sections.modify += `<old>${toXml(change.oldEntity)}</old><new>${toXml(change.entity)}</new>`
			} else {
				sections.modify += toXml(change.entity)
			}
		} else if (augmented && change.oldEntity) {
			sections.delete += `<old>${toXml(change.oldEntity)}</old>`
		} else {
			sections.delete += `<${type} ${idAttributes(change.entity)} />`
		}
	}
}

/**
 * Generate OSC (OSM Change) XML format string from a changeset.
 *
 * Produces an `<osmChange>` document with create, modify, and delete sections.
 * Within each section nodes come first, then ways, then relations, so that
 * every created entity is defined before it is referenced.
 *
 * @example
 * ```ts
 * const osc = generateOscChanges(changeset)
 * const augmentedOsc = generateOscChanges(changeset, { augmented: true })
 * ```
 */
export function generateOscChanges(
	changeset: OsmChangeset,
	options: Partial<OscOptions> = {},
) {
	const { augmented, generator } = { ...DEFAULT_OSC_OPTIONS, ...options }

	const sections: OscSections = { create: "", modify: "", delete: "" }
	addChanges(sections, changeset.nodeChanges, "node", nodeToXml, augmented)
	addChanges(sections, changeset.wayChanges, "way", wayToXml, augmented)
	addChanges(
		sections,
		changeset.relationChanges,
		"relation",
		relationToXml,
		augmented,
	)

	return [
		`<osmChange version="0.6" generator="${escapeXmlAttribute(generator)}">`,
		`<create>${sections.create}</create>`,
		`<modify>${sections.modify}</modify>`,
		`<delete>${sections.delete}</delete>`,
		"</osmChange>",
	].join("")
}
