import { describe, it, expect } from 'vitest'
import { levenshtein, similarity } from '@application/resolver/similarity.ts'

describe('levenshtein', () => {
  it('should count insertions, deletions and substitutions', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3)
    expect(levenshtein('tomato', 'tomatoe')).toBe(1)
    expect(levenshtein('', 'salt')).toBe(4)
  })
})

describe('similarity', () => {
  it('should be one minus distance over the longer length', () => {
    expect(similarity('tomatoe', 'tomato')).toBeCloseTo(6 / 7, 10)
    expect(similarity('tomato', 'potato')).toBeCloseTo(4 / 6, 10)
  })

  it('should be symmetric', () => {
    expect(similarity('basil', 'basel')).toBe(similarity('basel', 'basil'))
  })

  it('should treat two empty keys as identical and one empty key as unrelated', () => {
    expect(similarity('', '')).toBe(1)
    expect(similarity('salt', '')).toBe(0)
  })
})
