import { describe, expect, it } from "vitest"
import { ConflictError, isConflictError } from "../src/errors"

describe("ConflictError", () => {
	it("is distinguishable from other errors", () => {
		const error = new ConflictError("Way 1 has been deleted")
		expect(error.name).toBe("ConflictError")
		expect(error.message).toBe("Way 1 has been deleted")
		expect(isConflictError(error)).toBe(true)
		expect(isConflictError(Error("Way 1 has been deleted"))).toBe(false)
		expect(isConflictError("Way 1 has been deleted")).toBe(false)
	})
})
