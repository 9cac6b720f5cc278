/**
 * Hydration of raw wire values into native graph types
 */

import { ProtocolError } from '../errors'
import { isStructure } from '../packstream/structure'
import type { Structure } from '../packstream/structure'
import { Node, Path, Relationship, UnboundRelationship } from './graph'
import type { Identity, PathSegment } from './graph'

const NODE = 0x4e // 'N'
const RELATIONSHIP = 0x52 // 'R'
const UNBOUND_RELATIONSHIP = 0x72 // 'r'
const PATH = 0x50 // 'P'

function expectFields(structure: Structure, count: number, name: string): readonly unknown[] {
  if (structure.fields.length !== count) {
    throw new ProtocolError(`${name} structure expects ${count} fields, got ${structure.fields.length}`)
  }
  return structure.fields
}

function asIdentity(value: unknown, what: string): Identity {
  if ((typeof value === 'number' && Number.isInteger(value)) || typeof value === 'bigint') {
    return value
  }
  throw new ProtocolError(`${what} must be an integer, got ${typeof value}`)
}

function asString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw new ProtocolError(`${what} must be a string, got ${typeof value}`)
  }
  return value
}

function asList(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ProtocolError(`${what} must be a list`)
  }
  return value
}

function asMap(value: unknown, what: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || isStructure(value)) {
    throw new ProtocolError(`${what} must be a map`)
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, hydrate(item)]))
}

function hydrateNode(structure: Structure): Node {
  const [identity, labels, properties] = expectFields(structure, 3, 'Node')
  return new Node(
    asIdentity(identity, 'Node identity'),
    asList(labels, 'Node labels').map((label) => asString(label, 'Node label')),
    asMap(properties, 'Node properties')
  )
}

function hydrateRelationship(structure: Structure): Relationship {
  const [identity, start, end, type, properties] = expectFields(structure, 5, 'Relationship')
  return new Relationship(
    asIdentity(identity, 'Relationship identity'),
    asIdentity(start, 'Relationship start'),
    asIdentity(end, 'Relationship end'),
    asString(type, 'Relationship type'),
    asMap(properties, 'Relationship properties')
  )
}

function hydrateUnboundRelationship(structure: Structure): UnboundRelationship {
  const [identity, type, properties] = expectFields(structure, 3, 'UnboundRelationship')
  return new UnboundRelationship(
    asIdentity(identity, 'Relationship identity'),
    asString(type, 'Relationship type'),
    asMap(properties, 'Relationship properties')
  )
}

/**
 * Rebuild a path from its distinct nodes, distinct relationships and the
 * index sequence that walks them. Relationship indices are 1-based; a
 * negative index means the relationship is traversed against its direction.
 */
function hydratePath(structure: Structure): Path {
  const [rawNodes, rawRelationships, rawSequence] = expectFields(structure, 3, 'Path')

  const nodes = asList(rawNodes, 'Path nodes').map((node) => {
    const value = hydrate(node)
    if (!(value instanceof Node)) {
      throw new ProtocolError('Path nodes must be Node structures')
    }
    return value
  })
  const relationships = asList(rawRelationships, 'Path relationships').map((rel) => {
    const value = hydrate(rel)
    if (!(value instanceof UnboundRelationship)) {
      throw new ProtocolError('Path relationships must be UnboundRelationship structures')
    }
    return value
  })
  const sequence = asList(rawSequence, 'Path sequence').map((index) => {
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      throw new ProtocolError('Path sequence must contain integers')
    }
    return index
  })

  const first = nodes[0]
  if (!first) {
    throw new ProtocolError('Path must contain at least one node')
  }
  if (sequence.length % 2 !== 0) {
    throw new ProtocolError(`Path sequence length must be even, got ${sequence.length}`)
  }

  const segments: PathSegment[] = []
  let last = first
  for (let i = 0; i < sequence.length; i += 2) {
    const relIndex = sequence[i]
    const next = nodes[sequence[i + 1]]
    if (!next) {
      throw new ProtocolError(`Path node index ${sequence[i + 1]} out of range`)
    }
    const unbound = relIndex === 0 ? undefined : relationships[Math.abs(relIndex) - 1]
    if (!unbound) {
      throw new ProtocolError(`Path relationship index ${relIndex} out of range`)
    }
    const relationship = relIndex > 0
      ? unbound.bind(last.identity, next.identity)
      : unbound.bind(next.identity, last.identity)
    segments.push({ start: last, relationship, end: next })
    last = next
  }

  return new Path(first, segments)
}

/**
 * Convert a raw PackStream value into its native form. Lists and maps are
 * hydrated recursively; unknown structures are returned unchanged.
 */
export function hydrate(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(hydrate)
  }
  if (isStructure(value)) {
    switch (value.signature) {
      case NODE:
        return hydrateNode(value)
      case RELATIONSHIP:
        return hydrateRelationship(value)
      case UNBOUND_RELATIONSHIP:
        return hydrateUnboundRelationship(value)
      case PATH:
        return hydratePath(value)
      default:
        return value
    }
  }
  if (typeof value === 'object' && value !== null) {
    return asMap(value, 'Value')
  }
  return value
}
