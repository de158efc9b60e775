/**
 * Segment 12: Corpus Conversion Tests
 *
 * `.tg` text to `.dot` text per item, target selection, and per-item
 * failures in a batch.
 */

import { describe, it, expect } from 'vitest'
import { convertTgToDot, convertCorpus, formatTargetLines } from '../src/corpus-conversion'
import { readDot } from '../src/dot-codec'
import { writeTg } from '../src/tg-codec'
import { synthesizeBenchmark } from '../src/game-synthesis'
import { createRandomSource } from '../src/random'

const CHAIN_TG = [
  'node s0: label["a"], owner[0]',
  'node s1: label["b"], owner[1]',
  'node s2: label["c"], owner[0]',
  '',
  'edge s0 -> s1',
  'edge s1 -> s2: (= (mod t 3) 0)',
  'edge s2 -> s2',
].join('\n')

describe('Segment 12: Corpus Conversion', () => {
  describe('convertTgToDot', () => {
    it('converts a game and targets its last node', () => {
      const outcome = convertTgToDot({ id: 'game-0001', text: CHAIN_TG })
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.value.targets).toEqual(['s2'])
      expect(outcome.value.warnings).toEqual([])
      expect(outcome.value.dot).toBe([
        'digraph game_0001 {',
        '    s0 [name="s0", player=0];',
        '    s1 [name="s1", player=1];',
        '    s2 [name="s2", player=0, target=1];',
        '',
        '    s0 -> s1;',
        '    s1 -> s2 [constraint="time % 3 == 0"];',
        '    s2 -> s2;',
        '}',
        '',
      ].join('\n'))
    })

    it('also targets nodes with target-like labels', () => {
      const text = 'node a: label["goal"], owner[0]\nnode b: label["x"], owner[1]\nedge a -> b\nedge b -> a\n'
      const outcome = convertTgToDot({ id: 'g', text })
      expect(outcome.ok && outcome.value.targets).toEqual(['a', 'b'])
    })

    it('prefers the targets header', () => {
      const game = synthesizeBenchmark(createRandomSource(5), 12)
      const expected = [...game.nodes.values()].filter((n) => n.isTarget).map((n) => n.id)
      const outcome = convertTgToDot({ id: 'test001', text: writeTg(game) })
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.value.targets).toEqual(expected)
      expect(readDot(outcome.value.dot).nodes.filter((n) => n.isTarget).map((n) => n.id)).toEqual(expected)
    })

    it('uses the given graph name', () => {
      const outcome = convertTgToDot({ id: 'x.tg', text: CHAIN_TG, name: 'chain' })
      expect(outcome.ok && outcome.value.dot.split('\n')[0]).toBe('digraph chain {')
    })

    it('converts unparseable constraints to unconstrained edges with a warning', () => {
      const text = 'node a: owner[0]\nedge a -> a: (xor (= t 1) (= t 2))\n'
      const outcome = convertTgToDot({ id: 'bad', text })
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.value.dot).toContain('    a -> a;\n')
      expect(outcome.value.warnings.map((w) => w.id)).toEqual(['bad:a->a@2'])
    })

    it('fails on malformed lines', () => {
      const outcome = convertTgToDot({ id: 'broken', text: 'node a: owner[0]\nwhat\nedge a -> a\n' })
      expect(outcome.ok).toBe(false)
      if (outcome.ok) return
      expect(outcome.error.id).toBe('broken')
      expect(outcome.error.lineErrors.map((e) => e.line)).toEqual([2])
      expect(outcome.error.message).toBe('Cannot convert broken: 1 malformed line(s), 0 violation(s)')
    })

    it('fails on invalid games', () => {
      const outcome = convertTgToDot({ id: 'dangling', text: 'node a: owner[0]\nedge a -> b\n' })
      expect(outcome.ok).toBe(false)
      if (outcome.ok) return
      expect(outcome.error.violations.map((v) => v.kind)).toEqual(['DANGLING_EDGE_REFERENCE'])
    })
  })

  describe('convertCorpus', () => {
    it('converts every item and counts failures', () => {
      const conversion = convertCorpus([
        { id: 'one', text: CHAIN_TG },
        { id: 'two', text: '' },
        { id: 'three', text: CHAIN_TG },
      ])
      expect(conversion.outcomes.map((o) => o.ok)).toEqual([true, false, true])
      expect(conversion.failureCount).toBe(1)
    })

    it('formats one target line per converted game', () => {
      const conversion = convertCorpus([
        { id: 'one', text: CHAIN_TG },
        { id: 'two', text: '' },
        { id: 'three', text: '// targets: s0,s1\n' + CHAIN_TG },
      ])
      expect(formatTargetLines(conversion)).toBe('s2\ns0,s1\n')
    })
  })
})
