import { describe, it, expect } from "vitest"
import { Ok, Err, tryCatchWith, type Result } from "./result"

describe("Result", () => {
  it("Ok wraps a value", () => {
    const result: Result<number, string> = Ok(42)
    expect(result).toEqual({ ok: true, value: 42 })
  })

  it("Err wraps an error", () => {
    const result: Result<number, string> = Err("boom")
    expect(result).toEqual({ ok: false, error: "boom" })
  })

  describe("tryCatchWith", () => {
    it("returns Ok when the operation resolves", async () => {
      const result = await tryCatchWith(
        async () => "done",
        () => "mapped"
      )
      expect(result).toEqual({ ok: true, value: "done" })
    })

    it("maps a thrown value into Err", async () => {
      const result = await tryCatchWith(
        async () => {
          throw new Error("failed")
        },
        (e) => (e instanceof Error ? `mapped: ${e.message}` : "unknown")
      )
      expect(result).toEqual({ ok: false, error: "mapped: failed" })
    })
  })
})
