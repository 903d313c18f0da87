import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("sets name to the subclass name", () => {
      class SampleError extends BaseError<"sample"> {}
      const err = new SampleError("boom", { code: "sample" })

      expect(err.name).toBe("SampleError")
    })

    it("defaults to non-retryable and operational", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("freezes a copy of the context", () => {
      const context = { key: "port" }
      const err = new BaseError("test", { code: "test", context })

      context.key = "host"

      expect(err.context).toEqual({ key: "port" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("stamps the creation time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("bad port", { code: "test", context: { key: "port" } })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "bad port",
        context: { key: "port" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes the cause chain recursively", () => {
    const root = new Error("root cause")
    const outer = new BaseError("outer", { code: "outer", cause: root })

    const serialized = serializeError(outer)

    expect(serialized.cause?.code).toBe("unknown")
    expect(serialized.cause?.message).toBe("root cause")
  })

  it("omits stack unless requested", () => {
    const err = new BaseError("test", { code: "test" })

    expect("stack" in serializeError(err)).toBe(false)
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("renders bigint context values as strings", () => {
    const err = new BaseError("test", { code: "test", context: { value: 10n } })

    expect(serializeError(err).context).toEqual({ value: "10" })
    expect(() => JSON.stringify(err)).not.toThrow()
  })

  it("marks plain errors as non-operational with code unknown", () => {
    const serialized = serializeError(new TypeError("nope"))

    expect(serialized).toMatchObject({
      name: "TypeError",
      code: "unknown",
      isOperational: false,
    })
  })

  it("wraps non-error values", () => {
    expect(serializeError("oops")).toMatchObject({ name: "NonErrorThrown", message: "oops" })
    expect(serializeError({ a: 1 }).context).toEqual({ value: { a: 1 } })
  })
})
