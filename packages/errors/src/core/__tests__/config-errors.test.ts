import {
  CheckerUsageError,
  ConfigBuilderError,
  ConfigLoadError,
  ConstraintViolationError,
  MissingDefaultError,
  TypeMismatchError,
  UnknownKeyError,
  UnsetValueError,
} from "../config-errors"

describe("config errors", () => {
  it("builder errors name the key and property", () => {
    const err = ConfigBuilderError.duplicateProperty("port", "type")

    expect(err.message).toBe("type has already been specified for: port")
    expect(err.code).toBe("config_builder_error")
    expect(err.context).toEqual({ key: "port", property: "type" })
    expect(err.isOperational).toBe(false)
  })

  it("constraint violations are operational and never retryable", () => {
    const err = new ConstraintViolationError("value must be a non-empty string")

    expect(err.code).toBe("constraint_violation")
    expect(err.isOperational).toBe(true)
    expect(err.isRetryable).toBe(false)
    expect(err.key).toBeUndefined()
  })

  it("forKey() prefixes the message and keeps the original as cause", () => {
    const original = new ConstraintViolationError("value must be positive", {
      context: { value: -1 },
    })

    const keyed = original.forKey("retries")

    expect(keyed.message).toBe("invalid value for retries: value must be positive")
    expect(keyed.reason).toBe("value must be positive")
    expect(keyed.key).toBe("retries")
    expect(keyed.context).toEqual({ value: -1, key: "retries" })
    expect(keyed.cause).toBe(original)
  })

  it("forKey() leaves an already keyed violation alone", () => {
    const keyed = new ConstraintViolationError("bad").forKey("a")

    expect(keyed.forKey("b")).toBe(keyed)
  })

  it("type mismatches carry expected and actual types", () => {
    const err = new TypeMismatchError("port", "integer", "string")

    expect(err.message).toBe("value for port must be of type integer, currently: string")
    expect(err.code).toBe("type_mismatch")
    expect(err.context).toEqual({ key: "port", expected: "integer", actual: "string" })
  })

  it("lookup errors carry the key", () => {
    expect(new UnknownKeyError("prot").message).toBe("no config item with key: prot")
    expect(new UnsetValueError("host").code).toBe("value_unset")
    expect(new MissingDefaultError("host").message).toBe(
      "no default has been declared for: host",
    )
  })

  it("checker usage errors are not operational", () => {
    const err = new CheckerUsageError("null values are already allowed")

    expect(err.code).toBe("checker_usage_error")
    expect(err.isOperational).toBe(false)
  })

  it("load errors list every issue", () => {
    const err = new ConfigLoadError([
      { key: "port", source: "env", code: "type_mismatch", message: "bad type" },
      { key: "host", source: "json:app.json", code: "constraint_violation", message: "empty" },
    ])

    expect(err.message).toBe(
      "Configuration loading failed:\n  - port (env): bad type\n  - host (json:app.json): empty",
    )
    expect(err.issues).toHaveLength(2)
  })
})
