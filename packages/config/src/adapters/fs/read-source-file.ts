import fs from "node:fs/promises"
import path from "node:path"

/**
 * Options shared by the file-backed sources.
 */
export type SourceFileOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", "config.json", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Loads as empty if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** Reads the file as UTF-8; resolves `undefined` for a missing optional file. */
export async function readSourceFile(opts: SourceFileOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFound(err)) {
      return undefined
    }
    throw err
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
