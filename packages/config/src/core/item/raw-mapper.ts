import type { TypeTag } from "../../ports/type-tag"

export type MapResult<T> = { matched: true; value: T } | { matched: false }

/** Converts raw input of one declared type into an item's type. */
export interface RawMapper<T> {
  /** Name of the raw type the mapper takes. */
  readonly from: string

  /** Maps `raw` when it satisfies the source tag; reports `matched: false` otherwise. */
  tryMap(raw: unknown): MapResult<T>
}

export function createRawMapper<R, T>(from: TypeTag<R>, map: (raw: R) => T): RawMapper<T> {
  return {
    from: from.name,
    tryMap: (raw) => (from.is(raw) ? { matched: true, value: map(raw) } : { matched: false }),
  }
}
