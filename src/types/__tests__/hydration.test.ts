import { describe, it, expect } from 'vitest'
import { hydrate } from '../hydration'
import { Node, Path, Relationship, UnboundRelationship } from '../graph'
import { Structure } from '../../packstream/structure'
import { ProtocolError } from '../../errors'

const node = (id: number, label: string, name: string) => new Structure(0x4e, [id, [label], { name }])
const unbound = (id: number, type: string) => new Structure(0x72, [id, type, {}])

describe('hydrate()', () => {
  it('should leave scalars untouched', () => {
    expect(hydrate(1)).toBe(1)
    expect(hydrate('a')).toBe('a')
    expect(hydrate(null)).toBeNull()
    expect(hydrate(2n ** 62n)).toBe(2n ** 62n)
  })

  it('should build nodes', () => {
    const value = hydrate(node(1, 'Person', 'Alice'))
    expect(value).toBeInstanceOf(Node)
    expect(value).toMatchObject({ identity: 1, labels: ['Person'], properties: { name: 'Alice' } })
  })

  it('should build relationships', () => {
    const value = hydrate(new Structure(0x52, [5, 1, 2, 'KNOWS', { since: 2020 }]))
    expect(value).toEqual(new Relationship(5, 1, 2, 'KNOWS', { since: 2020 }))
  })

  it('should build unbound relationships', () => {
    expect(hydrate(unbound(10, 'LIKES'))).toEqual(new UnboundRelationship(10, 'LIKES', {}))
  })

  it('should hydrate inside lists and maps', () => {
    const value = hydrate({ people: [node(1, 'Person', 'Alice')], count: 1 })
    expect(value).toEqual({ people: [new Node(1, ['Person'], { name: 'Alice' })], count: 1 })
  })

  it('should return unknown structures unchanged', () => {
    const point = new Structure(0x58, [7203, 1.5, 2.5])
    expect(hydrate(point)).toBe(point)
  })

  it('should reject malformed graph structures', () => {
    expect(() => hydrate(new Structure(0x4e, [1, ['Person']]))).toThrow('Node structure expects 3 fields, got 2')
    expect(() => hydrate(new Structure(0x4e, ['1', [], {}]))).toThrow('Node identity must be an integer, got string')
    expect(() => hydrate(new Structure(0x52, [1, 2, 3, 4, {}]))).toThrow('Relationship type must be a string')
  })

  describe('paths', () => {
    it('should walk relationships in both directions', () => {
      const path = hydrate(
        new Structure(0x50, [
          [node(1, 'Person', 'A'), node(2, 'Person', 'B'), node(3, 'Person', 'C')],
          [unbound(10, 'KNOWS'), unbound(11, 'LIKES')],
          [1, 1, -2, 2],
        ])
      )

      expect(path).toBeInstanceOf(Path)
      if (!(path instanceof Path)) {
        return
      }
      expect(path.length).toBe(2)
      expect(path.nodes().map((n) => n.identity)).toEqual([1, 2, 3])
      expect(path.relationships()).toEqual([
        new Relationship(10, 1, 2, 'KNOWS', {}),
        new Relationship(11, 3, 2, 'LIKES', {}),
      ])
      expect(path.start.identity).toBe(1)
      expect(path.end.identity).toBe(3)
    })

    it('should accept a single-node path', () => {
      const path = hydrate(new Structure(0x50, [[node(1, 'Person', 'A')], [], []]))

      expect(path).toBeInstanceOf(Path)
      if (!(path instanceof Path)) {
        return
      }
      expect(path.length).toBe(0)
      expect(path.end).toBe(path.start)
    })

    it('should reject broken index sequences', () => {
      const nodes = [node(1, 'Person', 'A'), node(2, 'Person', 'B')]
      const rels = [unbound(10, 'KNOWS')]

      expect(() => hydrate(new Structure(0x50, [nodes, rels, [1]]))).toThrow('Path sequence length must be even, got 1')
      expect(() => hydrate(new Structure(0x50, [nodes, rels, [1, 5]]))).toThrow('Path node index 5 out of range')
      expect(() => hydrate(new Structure(0x50, [nodes, rels, [0, 1]]))).toThrow('Path relationship index 0 out of range')
      expect(() => hydrate(new Structure(0x50, [[], rels, []]))).toThrow(ProtocolError)
    })
  })
})

describe('graph types', () => {
  it('should render nodes and relationships', () => {
    expect(new Node(1, ['Person', 'Admin'], { name: 'A' }).toString()).toBe('(1:Person:Admin {"name":"A"})')
    expect(new Relationship(10, 1, 2, 'KNOWS', {}).toString()).toBe('(1)-[10:KNOWS {}]->(2)')
  })

  it('should keep properties read-only', () => {
    const properties = { name: 'A' }
    const n = new Node(1, [], properties)
    properties.name = 'B'
    expect(n.properties.name).toBe('A')
    expect(Object.isFrozen(n.properties)).toBe(true)
  })

  it('should bind unbound relationships to their end nodes', () => {
    expect(new UnboundRelationship(4, 'OWNS', { since: 1 }).bind(7, 8)).toEqual(
      new Relationship(4, 7, 8, 'OWNS', { since: 1 })
    )
  })
})
