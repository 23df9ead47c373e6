import { describe, it, expect } from 'vitest'
import {
  LABEL_VALUES,
  FALLBACK_LABEL,
  UNKNOWN_LABEL,
  isLabel,
  parseLabel,
  resolveLabel,
} from '../lib/labels'

describe('labels', () => {
  it('has a closed set of three labels with Hindu as fallback', () => {
    expect(LABEL_VALUES).toEqual(['Hindu', 'Christian', 'Muslim'])
    expect(FALLBACK_LABEL).toBe('Hindu')
  })

  describe('isLabel', () => {
    it('accepts exact members only', () => {
      expect(isLabel('Muslim')).toBe(true)
      expect(isLabel('muslim')).toBe(false)
      expect(isLabel(null)).toBe(false)
    })
  })

  describe('parseLabel', () => {
    it('passes exact members through', () => {
      expect(parseLabel('Christian')).toBe('Christian')
      expect(parseLabel('Muslim')).toBe('Muslim')
    })

    it('does not normalize case or whitespace', () => {
      expect(parseLabel('  hindu ')).toBe(UNKNOWN_LABEL)
      expect(parseLabel('MUSLIM')).toBe(UNKNOWN_LABEL)
      expect(parseLabel(' Christian')).toBe(UNKNOWN_LABEL)
    })

    it('maps anything else to the unknown sentinel', () => {
      expect(parseLabel('Buddhist')).toBe(UNKNOWN_LABEL)
      expect(parseLabel('')).toBe(UNKNOWN_LABEL)
      expect(parseLabel(1)).toBe(UNKNOWN_LABEL)
      expect(parseLabel(undefined)).toBe(UNKNOWN_LABEL)
      expect(parseLabel({ label: 'Hindu' })).toBe(UNKNOWN_LABEL)
    })
  })

  describe('resolveLabel', () => {
    it('passes known labels through', () => {
      expect(resolveLabel('Christian')).toEqual({ label: 'Christian', fallback: false })
    })

    it('substitutes the fallback for a near miss in case', () => {
      expect(resolveLabel('christian')).toEqual({ label: 'Hindu', fallback: true })
    })

    it('substitutes the fallback for unknown values', () => {
      expect(resolveLabel('Atheist')).toEqual({ label: 'Hindu', fallback: true })
    })
  })
})
