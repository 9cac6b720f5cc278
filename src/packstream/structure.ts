/**
 * PackStream structure: a signature byte plus an ordered list of fields
 */
export class Structure {
  readonly signature: number
  readonly fields: readonly unknown[]

  constructor(signature: number, fields: readonly unknown[]) {
    if (!Number.isInteger(signature) || signature < 0 || signature > 0xff) {
      throw new RangeError(`Structure signature must be a byte, got ${signature}`)
    }
    this.signature = signature
    this.fields = Object.freeze([...fields])
  }

  get size(): number {
    return this.fields.length
  }

  toString(): string {
    return `Structure<0x${this.signature.toString(16).toUpperCase().padStart(2, '0')}>(${this.fields.length} fields)`
  }
}

export function isStructure(value: unknown): value is Structure {
  return value instanceof Structure
}
