/**
 * Assertion utilities for internal invariants.
 *
 * These throw plain errors: a failing assertion is a programming error, not a
 * conflict with remote data.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @param value - The value to check.
 * @param message - Optional error message if assertion fails.
 * @throws Error if value is null or undefined.
 *
 * @example
 * ```ts
 * const chunk = chunks[index]
 * assertValue(chunk, `No chunk at index ${index}`)
 * // TypeScript now knows chunk is non-nullable
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Exhaustiveness check for discriminated unions.
 */
export function assertNever(value: never, message?: string): never {
	throw Error(message ?? `Unexpected value: ${JSON.stringify(value)}`)
}
