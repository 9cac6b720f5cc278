/**
 * Graph types returned by the server: nodes, relationships and paths
 */

export type Identity = number | bigint

/**
 * A node with its labels and properties
 */
export class Node {
  readonly identity: Identity
  readonly labels: readonly string[]
  readonly properties: Readonly<Record<string, unknown>>

  constructor(identity: Identity, labels: readonly string[], properties: Record<string, unknown>) {
    this.identity = identity
    this.labels = Object.freeze([...labels])
    this.properties = Object.freeze({ ...properties })
  }

  toString(): string {
    const labels = this.labels.map((label) => `:${label}`).join('')
    return `(${this.identity}${labels} ${JSON.stringify(this.properties)})`
  }
}

/**
 * A relationship whose end nodes are not yet known, as carried inside a path
 */
export class UnboundRelationship {
  readonly identity: Identity
  readonly type: string
  readonly properties: Readonly<Record<string, unknown>>

  constructor(identity: Identity, type: string, properties: Record<string, unknown>) {
    this.identity = identity
    this.type = type
    this.properties = Object.freeze({ ...properties })
  }

  /**
   * Attach start and end nodes, producing a full relationship
   */
  bind(start: Identity, end: Identity): Relationship {
    return new Relationship(this.identity, start, end, this.type, { ...this.properties })
  }

  toString(): string {
    return `-[${this.identity}:${this.type} ${JSON.stringify(this.properties)}]-`
  }
}

/**
 * A relationship between two nodes
 */
export class Relationship {
  readonly identity: Identity
  readonly start: Identity
  readonly end: Identity
  readonly type: string
  readonly properties: Readonly<Record<string, unknown>>

  constructor(
    identity: Identity,
    start: Identity,
    end: Identity,
    type: string,
    properties: Record<string, unknown>
  ) {
    this.identity = identity
    this.start = start
    this.end = end
    this.type = type
    this.properties = Object.freeze({ ...properties })
  }

  toString(): string {
    return `(${this.start})-[${this.identity}:${this.type} ${JSON.stringify(this.properties)}]->(${this.end})`
  }
}

export interface PathSegment {
  start: Node
  relationship: Relationship
  end: Node
}

/**
 * An alternating sequence of nodes and relationships, starting and ending with a node
 */
export class Path {
  readonly start: Node
  readonly end: Node
  readonly segments: readonly PathSegment[]

  constructor(start: Node, segments: readonly PathSegment[]) {
    this.start = start
    this.segments = Object.freeze([...segments])
    const last = segments[segments.length - 1]
    this.end = last ? last.end : start
  }

  get length(): number {
    return this.segments.length
  }

  nodes(): Node[] {
    return [this.start, ...this.segments.map((segment) => segment.end)]
  }

  relationships(): Relationship[] {
    return this.segments.map((segment) => segment.relationship)
  }
}
