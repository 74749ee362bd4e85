import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("omits the stack by default", () => {
    const result = serializeError(new BaseError("x", { code: "test" }))

    expect(result).not.toHaveProperty("stack")
  })

  it("includes the stack when asked", () => {
    const err = new BaseError("x", { code: "test" })

    const result = serializeError(err, { includeStack: true })

    expect(result.stack).toBe(err.stack)
  })

  it("wraps a thrown string", () => {
    expect(serializeError("boom")).toStrictEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("keeps a thrown non-string value in context", () => {
    const result = serializeError({ reason: 42 })

    expect(result.message).toBe("Unknown error")
    expect(result.context).toStrictEqual({ value: { reason: 42 } })
  })
})
