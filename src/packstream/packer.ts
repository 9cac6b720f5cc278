/**
 * PackStream Packer
 * Serialises JavaScript values into PackStream bytes
 */

import { ProtocolError } from '../errors'
import { Structure } from './structure'
import * as M from './markers'

const INITIAL_CAPACITY = 256
const INT_64_MIN = -(2n ** 63n)
const INT_64_MAX = 2n ** 63n - 1n

const encoder = new TextEncoder()

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Packer - appends PackStream-encoded values to a growable buffer
 */
export class Packer {
  private _buffer: Uint8Array = new Uint8Array(INITIAL_CAPACITY)
  private _view: DataView = new DataView(this._buffer.buffer)
  private _length = 0

  /**
   * Number of bytes written so far
   */
  get length(): number {
    return this._length
  }

  /**
   * Copy of the bytes written so far
   */
  toBytes(): Uint8Array {
    return this._buffer.slice(0, this._length)
  }

  /**
   * Discard everything written so far
   */
  reset(): void {
    this._length = 0
  }

  pack(value: unknown): void {
    if (value === null) {
      this._writeUint8(M.NULL)
    } else if (value === true) {
      this._writeUint8(M.TRUE)
    } else if (value === false) {
      this._writeUint8(M.FALSE)
    } else if (typeof value === 'number') {
      this._packNumber(value)
    } else if (typeof value === 'bigint') {
      this._packBigInt(value)
    } else if (typeof value === 'string') {
      this._packString(value)
    } else if (Array.isArray(value)) {
      this._packList(value)
    } else if (value instanceof Structure) {
      this.packStructure(value.signature, value.fields)
    } else if (value instanceof Map) {
      this._packMap(Array.from(value.entries()))
    } else if (typeof value === 'object' && isPlainObject(value)) {
      this._packMap(Object.entries(value))
    } else {
      const kind = typeof value === 'object' ? value.constructor.name : typeof value
      throw new ProtocolError(`Cannot pack value of type ${kind}`)
    }
  }

  packStructure(signature: number, fields: readonly unknown[]): void {
    const size = fields.length
    if (size < 0x10) {
      this._writeUint8(M.TINY_STRUCT | size)
    } else if (size <= 0xff) {
      this._writeUint8(M.STRUCT_8)
      this._writeUint8(size)
    } else if (size <= 0xffff) {
      this._writeUint8(M.STRUCT_16)
      this._writeUint16(size)
    } else {
      throw new ProtocolError(`Structure has too many fields: ${size}`)
    }
    this._writeUint8(signature)
    for (const field of fields) {
      this.pack(field)
    }
  }

  private _packNumber(value: number): void {
    if (Number.isSafeInteger(value)) {
      this._packInteger(value)
      return
    }
    this._ensure(9)
    this._buffer[this._length++] = M.FLOAT_64
    this._view.setFloat64(this._length, value)
    this._length += 8
  }

  private _packBigInt(value: bigint): void {
    if (value < INT_64_MIN || value > INT_64_MAX) {
      throw new ProtocolError(`Integer ${value} does not fit in 64 bits`)
    }
    if (value >= -(2n ** 31n) && value < 2n ** 31n) {
      this._packInteger(Number(value))
      return
    }
    this._writeInt64(value)
  }

  private _packInteger(value: number): void {
    if (value >= M.TINY_INT_MIN && value <= M.TINY_INT_MAX) {
      this._writeUint8(value & 0xff)
    } else if (value >= -0x80 && value < 0x80) {
      this._writeUint8(M.INT_8)
      this._writeUint8(value & 0xff)
    } else if (value >= -0x8000 && value < 0x8000) {
      this._writeUint8(M.INT_16)
      this._ensure(2)
      this._view.setInt16(this._length, value)
      this._length += 2
    } else if (value >= -0x80000000 && value < 0x80000000) {
      this._writeUint8(M.INT_32)
      this._ensure(4)
      this._view.setInt32(this._length, value)
      this._length += 4
    } else {
      this._writeInt64(BigInt(value))
    }
  }

  private _writeInt64(value: bigint): void {
    this._writeUint8(M.INT_64)
    this._ensure(8)
    this._view.setBigInt64(this._length, value)
    this._length += 8
  }

  private _packString(value: string): void {
    const bytes = encoder.encode(value)
    this._writeHeader(bytes.length, M.TINY_STRING, M.STRING_8, M.STRING_16, M.STRING_32)
    this._ensure(bytes.length)
    this._buffer.set(bytes, this._length)
    this._length += bytes.length
  }

  private _packList(values: readonly unknown[]): void {
    this._writeHeader(values.length, M.TINY_LIST, M.LIST_8, M.LIST_16, M.LIST_32)
    for (const item of values) {
      if (item === undefined) {
        throw new ProtocolError('Cannot pack undefined inside a list')
      }
      this.pack(item)
    }
  }

  private _packMap(entries: [unknown, unknown][]): void {
    const defined: [string, unknown][] = []
    for (const [key, value] of entries) {
      if (typeof key !== 'string') {
        throw new ProtocolError(`Map keys must be strings, got ${typeof key}`)
      }
      if (value !== undefined) {
        defined.push([key, value])
      }
    }
    this._writeHeader(defined.length, M.TINY_MAP, M.MAP_8, M.MAP_16, M.MAP_32)
    for (const [key, value] of defined) {
      this._packString(key)
      this.pack(value)
    }
  }

  private _writeHeader(size: number, tiny: number, size8: number, size16: number, size32: number): void {
    if (size < 0x10) {
      this._writeUint8(tiny | size)
    } else if (size <= 0xff) {
      this._writeUint8(size8)
      this._writeUint8(size)
    } else if (size <= 0xffff) {
      this._writeUint8(size16)
      this._writeUint16(size)
    } else if (size <= 0xffffffff) {
      this._writeUint8(size32)
      this._ensure(4)
      this._view.setUint32(this._length, size)
      this._length += 4
    } else {
      throw new ProtocolError(`Collection too large to pack: ${size}`)
    }
  }

  private _writeUint8(value: number): void {
    this._ensure(1)
    this._buffer[this._length++] = value
  }

  private _writeUint16(value: number): void {
    this._ensure(2)
    this._view.setUint16(this._length, value)
    this._length += 2
  }

  private _ensure(extra: number): void {
    const required = this._length + extra
    if (required <= this._buffer.length) {
      return
    }
    let capacity = this._buffer.length * 2
    while (capacity < required) {
      capacity *= 2
    }
    const next = new Uint8Array(capacity)
    next.set(this._buffer.subarray(0, this._length))
    this._buffer = next
    this._view = new DataView(next.buffer)
  }
}

/**
 * Pack a single value into a fresh byte array
 */
export function pack(value: unknown): Uint8Array {
  const packer = new Packer()
  packer.pack(value)
  return packer.toBytes()
}
