import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses JSON object", async () => {
    await fs.writeFile(
      path.join(cwd, "config.json"),
      JSON.stringify({ PORT: 3000, HOST: "localhost", DEBUG: true }),
    )

    const source = new JsonSource({ file: "config.json", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      PORT: 3000,
      HOST: "localhost",
      DEBUG: true,
    })
  })

  it("flattens nested objects to dotted keys", async () => {
    await fs.writeFile(
      path.join(cwd, "config.json"),
      JSON.stringify({
        db: { host: "localhost", pool: { max: 10 } },
        redis: { url: "redis://localhost:6379" },
      }),
    )

    const source = new JsonSource({ file: "config.json", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      "db.host": "localhost",
      "db.pool.max": 10,
      "redis.url": "redis://localhost:6379",
    })
  })

  it("keeps arrays, nulls and empty objects as leaf values", async () => {
    await fs.writeFile(
      path.join(cwd, "config.json"),
      JSON.stringify({ hosts: ["a", "b"], proxy: null, extra: {} }),
    )

    const source = new JsonSource({ file: "config.json", required: true, cwd })

    expect(await source.load()).toEqual({ hosts: ["a", "b"], proxy: null, extra: {} })
  })

  it("keeps __proto__ keys as ordinary entries", async () => {
    await fs.writeFile(
      path.join(cwd, "config.json"),
      '{"__proto__": ["a"], "nested": {"__proto__": 1}}',
    )

    const source = new JsonSource({ file: "config.json", required: true, cwd })
    const result = await source.load()

    expect(Object.keys(result)).toEqual(["__proto__", "nested.__proto__"])
    expect(Object.getOwnPropertyDescriptor(result, "__proto__")?.value).toEqual(["a"])
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
  })

  it.each(["[1, 2]", "42", "null"])("rejects a top-level %s", async (content) => {
    await fs.writeFile(path.join(cwd, "config.json"), content)

    const source = new JsonSource({ file: "config.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(
      "json:config.json: top-level JSON value must be an object",
    )
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new JsonSource({ file: "config.json", required: false, cwd })
    const result = await source.load()

    expect(result).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new JsonSource({ file: "config.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow()
  })

  it("throws on invalid JSON", async () => {
    await fs.writeFile(path.join(cwd, "config.json"), "{ invalid json }")

    const source = new JsonSource({ file: "config.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow()
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, "app.json"), JSON.stringify({ KEY: "value" }))

    const source = new JsonSource({ file: "app.json", required: true, cwd: subdir })
    const result = await source.load()

    expect(result).toEqual({ KEY: "value" })
  })
})
