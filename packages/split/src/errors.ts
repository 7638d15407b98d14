/**
 * The edit cannot be applied to the current state of the map data, for
 * example because the element was deleted or changed in the meantime.
 *
 * Nothing has been changed when this is thrown. The caller decides whether to
 * retry with fresh data or to hand the conflict to a human.
 */
export class ConflictError extends Error {
	override name = "ConflictError"
}

export function isConflictError(error: unknown): error is ConflictError {
	return error instanceof ConflictError
}
