import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("key is too large", { code: "validation_failed" })

      expect(err.message).toBe("key is too large")
      expect(err.code).toBe("validation_failed")
    })

    it("sets name to constructor name", () => {
      class MissingKeyError extends BaseError<"not_found"> {}

      const err = new MissingKeyError("missing", { code: "not_found" })

      expect(err.name).toBe("MissingKeyError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("applies defaults", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
      expect(err.cause).toBeUndefined()
    })

    it("freezes a copy of the context", () => {
      const context = { key: "users:1" }
      const err = new BaseError("test", { code: "test", context })

      context.key = "changed"

      expect(err.context).toEqual({ key: "users:1" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("flush failed", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })
  })

  describe("toJSON", () => {
    it("serializes code, context and nested cause", () => {
      const err = new BaseError("flush failed", {
        code: "pipeline_flush_failed",
        context: { queued: 3 },
        cause: new Error("socket closed"),
      })

      expect(JSON.parse(JSON.stringify(err))).toStrictEqual({
        name: "BaseError",
        code: "pipeline_flush_failed",
        message: "flush failed",
        context: { queued: 3 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
        cause: {
          name: "Error",
          code: "unknown",
          message: "socket closed",
          context: {},
          isOperational: false,
          timestamp: "2024-01-15T10:30:00.000Z",
        },
      })
    })
  })
})
