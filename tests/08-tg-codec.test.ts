/**
 * Segment 8: `.tg` Codec Tests
 */

import { describe, it, expect } from 'vitest'
import { readTg, writeTg, MalformedGameLineError } from '../src/tg-codec'
import { GameBuilder, nodeIds, targetIds } from '../src/game-model'
import { always, and, greaterEq, lessEq, lessThan, mod, explicitSet, not, allOf } from '../src/constraint-ast'
import { createRandomSource } from '../src/random'
import { synthesizeBenchmark, synthesizeCycle } from '../src/game-synthesis'

const SAMPLE = [
  '// generated for the codec tests',
  'node s0: label["a"], owner[0]',
  'node s1: label["b"], owner[1]',
  'node s2: label["target"], owner[0]',
  '',
  'edge s0 -> s1',
  'edge s1 -> s2: (= (mod t 3) 0)',
  'edge s2 -> s2: (0,3,7)',
].join('\n')

describe('Segment 8: .tg Codec', () => {
  // ========================================================================
  // Writing
  // ========================================================================

  describe('writeTg', () => {
    it('writes node lines, a blank line and edge lines', () => {
      const game = new GameBuilder('g')
        .addNode({ id: 's0', owner: 0, label: 'a' })
        .addNode({ id: 's1', owner: 1, label: 'b' })
        .addEdge('s0', 's1')
        .addEdge('s1', 's0', and(greaterEq(2), lessEq(9)))
        .build()
      expect(writeTg(game)).toBe([
        'node s0: label["a"], owner[0]',
        'node s1: label["b"], owner[1]',
        '',
        'edge s0 -> s1',
        'edge s1 -> s0: (and (>= t 2) (<= t 9))',
        '',
      ].join('\n'))
    })

    it('writes header comments for time bound and targets', () => {
      const game = new GameBuilder('g')
        .addNode({ id: 'v0', owner: 1 })
        .addNode({ id: 'v1', owner: 0, isTarget: true })
        .addEdge('v0', 'v1', mod(2, 1))
        .setTimeBound(8)
        .build()
      expect(writeTg(game)).toBe([
        '// time_bound: 8',
        '// targets: v1',
        'node v0: label["v0"], owner[1]',
        'node v1: label["v1"], owner[0]',
        '',
        'edge v0 -> v1: (= (mod t 2) 1)',
        '',
      ].join('\n'))
    })
  })

  // ========================================================================
  // Reading
  // ========================================================================

  describe('readTg', () => {
    it('reads nodes and edges', () => {
      const { game, errors, warnings } = readTg(SAMPLE, 'sample')
      expect(errors).toEqual([])
      expect(warnings).toEqual([])
      expect(game.name).toBe('sample')
      expect(nodeIds(game)).toEqual(['s0', 's1', 's2'])
      expect(game.nodes.get('s2')).toEqual({ id: 's2', owner: 0, label: 'target', isTarget: false })
      expect(game.edges.map((e) => e.constraint)).toEqual([always(), mod(3, 0), explicitSet([0, 3, 7])])
    })

    it('defaults the label to the id', () => {
      const { game } = readTg('node x: owner[1]\n')
      expect(game.nodes.get('x')?.label).toBe('x')
    })

    it('reads the header comments', () => {
      const { game } = readTg('// time_bound: 12\n// targets: a, b\nnode a: owner[0]\nnode b: owner[1]\nedge a -> b\n')
      expect(game.timeBound).toBe(12)
      expect(targetIds(game)).toEqual(['a', 'b'])
    })

    it('accepts CRLF line endings', () => {
      const { game, errors } = readTg('node a: owner[0]\r\nedge a -> a\r\n')
      expect(errors).toEqual([])
      expect(game.edges).toHaveLength(1)
    })

    it('collects malformed lines and keeps going', () => {
      const text = [
        'node s0: owner[0]',
        'this is not a declaration',
        'node s1: label["x"]',
        'node s0: owner[1]',
        'edge s0 -> s0',
      ].join('\n')
      const { game, errors } = readTg(text)
      expect(errors.map((e) => e.line)).toEqual([2, 3, 4])
      expect(errors.every((e) => e instanceof MalformedGameLineError)).toBe(true)
      expect(errors[0].text).toBe('this is not a declaration')
      expect(nodeIds(game)).toEqual(['s0'])
      expect(game.nodes.get('s0')?.owner).toBe(0)
      expect(game.edges).toHaveLength(1)
    })

    it('keeps numeric owners other than 0 and 1 for the validator', () => {
      const { game, errors } = readTg('node a: owner[2]\n')
      expect(errors).toEqual([])
      expect(game.nodes.get('a')?.owner).toBe(2)
    })

    it('replaces an unparseable constraint with always and warns', () => {
      const { game, warnings } = readTg('node a: owner[0]\nnode b: owner[1]\nedge a -> b: (xor (>= t 1) (< t 2))\n')
      expect(game.edges[0].constraint).toEqual(always())
      expect(warnings).toHaveLength(1)
      expect(warnings[0].id).toBe('a->b@3')
      expect(warnings[0].input).toBe('(xor (>= t 1) (< t 2))')
    })

    it('reads an edge nested too deeply as always with a warning', () => {
      const deep = '(not '.repeat(20000) + '(= t 1)' + ')'.repeat(20000)
      const { game, errors, warnings } = readTg(`node a: owner[0]\nedge a -> a: ${deep}\n`)
      expect(errors).toEqual([])
      expect(game.edges[0].constraint).toEqual(always())
      expect(warnings.map((w) => w.id)).toEqual(['a->a@2'])
    })
  })

  // ========================================================================
  // Round Trip
  // ========================================================================

  describe('round trip', () => {
    it('writeTg(readTg(text)) reproduces canonical text', () => {
      const text = writeTg(readTg(SAMPLE).game)
      expect(writeTg(readTg(text).game)).toBe(text)
    })

    it('keeps a never-available edge never available', () => {
      const game = new GameBuilder('never')
        .addNode({ id: 'a', owner: 0 })
        .addNode({ id: 'b', owner: 1 })
        .addEdge('a', 'b', not(always()))
        .addEdge('b', 'a', allOf([always(), greaterEq(3)]))
        .build()
      const { game: read, warnings } = readTg(writeTg(game))
      expect(warnings).toEqual([])
      expect(read.edges.map((e) => e.constraint)).toEqual([lessThan(0), greaterEq(3)])
    })

    it('reproduces synthesized games including targets and time bound', () => {
      for (const game of [
        synthesizeCycle(createRandomSource(31), 7),
        synthesizeBenchmark(createRandomSource(32), 15),
      ]) {
        const { game: read, errors, warnings } = readTg(writeTg(game), game.name)
        expect(errors).toEqual([])
        expect(warnings).toEqual([])
        expect([...read.nodes.values()]).toEqual([...game.nodes.values()])
        expect(read.edges).toEqual(game.edges)
        expect(read.timeBound).toBe(game.timeBound)
      }
    })
  })
})
