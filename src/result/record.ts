/**
 * Record class for graphwire
 *
 * A Record represents a single row in a query result set.
 * Values can be accessed by column name or by position (0-indexed).
 */

import { FieldNotFoundError, IndexTypeError, InvariantViolationError } from '../errors'
import type { RecordShape } from '../types'

export type Visitor<R = void, T extends RecordShape = RecordShape> = (value: unknown, key: string, record: Record<T>) => R

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]))
  }
  return Object.is(a, b)
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value)
  }
  if (Array.isArray(value)) {
    return `[${value.map(renderValue).join(', ')}]`
  }
  return String(value)
}

/**
 * Represents a single row in a query result.
 * Each Record is a collection of named fields with values.
 */
export class Record<T extends RecordShape = RecordShape> implements Iterable<[string, unknown]> {
  private readonly _keys: readonly string[]
  private readonly _fields: readonly unknown[]
  private readonly _fieldLookup: Map<string, number>

  /**
   * Create a new Record.
   *
   * @param keys - Field names, unique within the record
   * @param fields - Values in the same order as the keys
   * @param fieldLookup - Pre-built name to position map, shared by records of one result
   */
  constructor(
    keys: readonly string[],
    fields: readonly unknown[],
    fieldLookup?: Map<string, number>
  ) {
    if (keys.length !== fields.length) {
      throw new InvariantViolationError(
        `Record keys/values length mismatch: ${keys.length} keys, ${fields.length} values`
      )
    }

    this._keys = Object.freeze([...keys])
    this._fields = Object.freeze([...fields])
    this._fieldLookup = fieldLookup ?? Record.buildLookup(keys)
  }

  /**
   * Build the name to position map for a list of keys
   *
   * @throws InvariantViolationError if a key appears twice
   */
  static buildLookup(keys: readonly string[]): Map<string, number> {
    const lookup = new Map<string, number>()
    for (let i = 0; i < keys.length; i++) {
      if (lookup.has(keys[i])) {
        throw new InvariantViolationError(`Duplicate record key '${keys[i]}'`)
      }
      lookup.set(keys[i], i)
    }
    return lookup
  }

  /**
   * Get the field keys (column names) in order of appearance.
   * Returns a frozen array.
   */
  get keys(): readonly string[] {
    return this._keys
  }

  /**
   * Get the number of fields in this record.
   */
  get length(): number {
    return this._fields.length
  }

  /**
   * Get a value by key (column name) or by index (0-indexed position).
   *
   * @throws FieldNotFoundError if the key doesn't exist or the index is out of range
   * @throws IndexTypeError if the index is not an integer
   */
  get<K extends keyof T>(key: K): T[K]
  get(key: string | number): unknown
  get(key: string | number): unknown {
    if (typeof key === 'number') {
      return this.getByIndex(key)
    }
    if (typeof key === 'string') {
      return this.getByName(key)
    }
    throw new IndexTypeError(key)
  }

  getByIndex(index: number): unknown {
    if (!Number.isInteger(index)) {
      throw new IndexTypeError(index)
    }
    if (index < 0 || index >= this._fields.length) {
      throw new FieldNotFoundError(index, this._keys)
    }
    return this._fields[index]
  }

  getByName(name: string): unknown {
    const index = this._fieldLookup.get(name)
    if (index === undefined) {
      throw new FieldNotFoundError(name, this._keys)
    }
    return this._fields[index]
  }

  /**
   * Check if this record contains a field with the given key.
   */
  has(key: string): boolean {
    return this._fieldLookup.has(key)
  }

  forEach(visitor: Visitor<void, T>): void {
    for (let i = 0; i < this._keys.length; i++) {
      visitor(this._fields[i], this._keys[i], this)
    }
  }

  map<R>(visitor: Visitor<R, T>): R[] {
    const result: R[] = []
    for (let i = 0; i < this._keys.length; i++) {
      result.push(visitor(this._fields[i], this._keys[i], this))
    }
    return result
  }

  /**
   * Convert this record to a plain JavaScript object.
   */
  toObject(): T {
    const obj: RecordShape = {}
    for (let i = 0; i < this._keys.length; i++) {
      obj[this._keys[i]] = this._fields[i]
    }
    return obj as T
  }

  values(): unknown[] {
    return [...this._fields]
  }

  entries(): [string, unknown][] {
    const result: [string, unknown][] = []
    for (let i = 0; i < this._keys.length; i++) {
      result.push([this._keys[i], this._fields[i]])
    }
    return result
  }

  /**
   * Compare with another record (keys and values must pair up identically)
   * or with a plain array (values compared by position only).
   */
  equals(other: Record | readonly unknown[]): boolean {
    if (other instanceof Record) {
      return valuesEqual([...this._keys], [...other.keys]) && valuesEqual(this.values(), other.values())
    }
    return valuesEqual(this.values(), [...other])
  }

  toString(): string {
    const pairs = this._keys.map((key, i) => `${key}=${renderValue(this._fields[i])}`)
    return `<Record ${pairs.join(' ')}>`
  }

  /**
   * Make Record iterable with for...of loops.
   * Yields [key, value] tuples.
   */
  *[Symbol.iterator](): Iterator<[string, unknown]> {
    for (let i = 0; i < this._keys.length; i++) {
      yield [this._keys[i], this._fields[i]]
    }
  }
}
