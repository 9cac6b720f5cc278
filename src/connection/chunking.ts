/**
 * Bolt message chunking
 *
 * A message travels as a series of chunks, each prefixed with its size as a
 * 16-bit big-endian integer, followed by a zero-size chunk marking the end.
 */

export const MAX_CHUNK_SIZE = 0xffff

/**
 * Split one encoded message into chunks, appending the end marker
 */
export function chunk(message: Uint8Array, maxChunkSize: number = MAX_CHUNK_SIZE): Uint8Array {
  if (maxChunkSize < 1 || maxChunkSize > MAX_CHUNK_SIZE) {
    throw new RangeError(`Chunk size must be between 1 and ${MAX_CHUNK_SIZE}, got ${maxChunkSize}`)
  }

  const chunkCount = Math.ceil(message.length / maxChunkSize)
  const output = new Uint8Array(message.length + chunkCount * 2 + 2)
  const view = new DataView(output.buffer)

  let offset = 0
  for (let start = 0; start < message.length; start += maxChunkSize) {
    const piece = message.subarray(start, start + maxChunkSize)
    view.setUint16(offset, piece.length)
    output.set(piece, offset + 2)
    offset += piece.length + 2
  }
  // end marker bytes are already zero
  return output
}

/**
 * Reassembles complete messages from an arbitrarily split byte stream
 */
export class Dechunker {
  private _pending: Uint8Array = new Uint8Array(0)
  private _parts: Uint8Array[] = []

  /**
   * Feed received bytes; returns every message completed by them
   */
  feed(bytes: Uint8Array): Uint8Array[] {
    const data = concat([this._pending, bytes])
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    const messages: Uint8Array[] = []

    let offset = 0
    while (offset + 2 <= data.length) {
      const size = view.getUint16(offset)
      if (size === 0) {
        // a zero-size chunk with nothing before it carries no message
        if (this._parts.length > 0) {
          messages.push(concat(this._parts))
          this._parts = []
        }
        offset += 2
        continue
      }
      if (offset + 2 + size > data.length) {
        break
      }
      this._parts.push(data.slice(offset + 2, offset + 2 + size))
      offset += 2 + size
    }

    this._pending = data.slice(offset)
    return messages
  }

  /**
   * True when no partial message is buffered
   */
  get idle(): boolean {
    return this._pending.length === 0 && this._parts.length === 0
  }
}

function concat(parts: Uint8Array[]): Uint8Array {
  let total = 0
  for (const part of parts) {
    total += part.length
  }
  const output = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    output.set(part, offset)
    offset += part.length
  }
  return output
}
