/**
 * PackStream Unpacker
 * Reads PackStream bytes back into JavaScript values
 */

import { ProtocolError } from '../errors'
import { Structure } from './structure'
import * as M from './markers'

const decoder = new TextDecoder('utf-8', { fatal: true })

const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER)
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * Unpacker - sequential reader over one PackStream-encoded buffer
 */
export class Unpacker {
  private readonly _bytes: Uint8Array
  private readonly _view: DataView
  private _offset = 0

  constructor(bytes: Uint8Array) {
    this._bytes = bytes
    this._view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  /**
   * Bytes not yet consumed
   */
  get remaining(): number {
    return this._bytes.length - this._offset
  }

  unpack(): unknown {
    const marker = this._readUint8()

    if (marker <= M.TINY_INT_MAX) {
      return marker
    }
    if (marker >= 0xf0) {
      return marker - 0x100
    }

    const high = marker & 0xf0
    const low = marker & 0x0f
    switch (high) {
      case M.TINY_STRING:
        return this._readString(low)
      case M.TINY_LIST:
        return this._readList(low)
      case M.TINY_MAP:
        return this._readMap(low)
      case M.TINY_STRUCT:
        return this._readStructure(low)
    }

    switch (marker) {
      case M.NULL:
        return null
      case M.TRUE:
        return true
      case M.FALSE:
        return false
      case M.FLOAT_64: {
        this._require(8)
        const value = this._view.getFloat64(this._offset)
        this._offset += 8
        return value
      }
      case M.INT_8: {
        this._require(1)
        return this._view.getInt8(this._offset++)
      }
      case M.INT_16: {
        this._require(2)
        const value = this._view.getInt16(this._offset)
        this._offset += 2
        return value
      }
      case M.INT_32: {
        this._require(4)
        const value = this._view.getInt32(this._offset)
        this._offset += 4
        return value
      }
      case M.INT_64: {
        this._require(8)
        const value = this._view.getBigInt64(this._offset)
        this._offset += 8
        return value >= SAFE_MIN && value <= SAFE_MAX ? Number(value) : value
      }
      case M.STRING_8:
        return this._readString(this._readUint8())
      case M.STRING_16:
        return this._readString(this._readUint16())
      case M.STRING_32:
        return this._readString(this._readUint32())
      case M.LIST_8:
        return this._readList(this._readUint8())
      case M.LIST_16:
        return this._readList(this._readUint16())
      case M.LIST_32:
        return this._readList(this._readUint32())
      case M.MAP_8:
        return this._readMap(this._readUint8())
      case M.MAP_16:
        return this._readMap(this._readUint16())
      case M.MAP_32:
        return this._readMap(this._readUint32())
      case M.STRUCT_8:
        return this._readStructure(this._readUint8())
      case M.STRUCT_16:
        return this._readStructure(this._readUint16())
      default:
        throw new ProtocolError(`Unknown PackStream marker 0x${marker.toString(16).toUpperCase()}`)
    }
  }

  private _readString(size: number): string {
    this._require(size)
    const bytes = this._bytes.subarray(this._offset, this._offset + size)
    this._offset += size
    try {
      return decoder.decode(bytes)
    } catch (error) {
      throw new ProtocolError(
        `Invalid UTF-8 string: ${error instanceof Error ? error.message : String(error)}`
      )
    }
  }

  private _readList(size: number): unknown[] {
    const list: unknown[] = []
    for (let i = 0; i < size; i++) {
      list.push(this.unpack())
    }
    return list
  }

  private _readMap(size: number): Record<string, unknown> {
    const entries: [string, unknown][] = []
    for (let i = 0; i < size; i++) {
      const key = this.unpack()
      if (typeof key !== 'string') {
        throw new ProtocolError(`Map keys must be strings, got ${typeof key}`)
      }
      entries.push([key, this.unpack()])
    }
    return Object.fromEntries(entries)
  }

  private _readStructure(size: number): Structure {
    const signature = this._readUint8()
    const fields: unknown[] = []
    for (let i = 0; i < size; i++) {
      fields.push(this.unpack())
    }
    return new Structure(signature, fields)
  }

  private _readUint8(): number {
    this._require(1)
    return this._view.getUint8(this._offset++)
  }

  private _readUint16(): number {
    this._require(2)
    const value = this._view.getUint16(this._offset)
    this._offset += 2
    return value
  }

  private _readUint32(): number {
    this._require(4)
    const value = this._view.getUint32(this._offset)
    this._offset += 4
    return value
  }

  private _require(size: number): void {
    if (this._offset + size > this._bytes.length) {
      throw new ProtocolError(
        `Unexpected end of data: needed ${size} bytes at offset ${this._offset}, ${this.remaining} left`
      )
    }
  }
}

/**
 * Unpack a single value, failing if bytes are left over
 */
export function unpack(bytes: Uint8Array): unknown {
  const unpacker = new Unpacker(bytes)
  const value = unpacker.unpack()
  if (unpacker.remaining > 0) {
    throw new ProtocolError(`${unpacker.remaining} trailing bytes after value`)
  }
  return value
}
