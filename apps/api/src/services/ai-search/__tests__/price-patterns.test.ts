import { describe, it, expect, vi } from 'vitest'
import { matchPricePatterns, parseAmount, roundPrice } from '../price-patterns'

describe('parseAmount', () => {
  it('reads plain integers and decimals', () => {
    expect(parseAmount('150')).toBe(150)
    expect(parseAmount('49,95')).toBe(49.95)
    expect(parseAmount('12.50')).toBe(12.5)
  })

  it('treats dot-grouped digits as thousands', () => {
    expect(parseAmount('1.250')).toBe(1250)
    expect(parseAmount('1.250,50')).toBe(1250.5)
  })
})

describe('matchPricePatterns', () => {
  it('returns null when the query has no price phrase', () => {
    expect(matchPricePatterns('rode jurk met bloemen')).toBeNull()
    expect(matchPricePatterns('')).toBeNull()
  })

  it('parses a Dutch range exactly', () => {
    const intent = matchPricePatterns('tussen 50 en 100 euro')
    expect(intent).toMatchObject({ minPrice: 50, maxPrice: 100, confidence: 0.95, source: 'regex_range' })
    expect(intent?.matches).toEqual([{ start: 0, end: 21, text: 'tussen 50 en 100 euro' }])
  })

  it('parses an English range and orders reversed bounds', () => {
    expect(matchPricePatterns('boots between 200 and 80 euro')).toMatchObject({ minPrice: 80, maxPrice: 200 })
  })

  it('accepts euro signs on both sides of a "tot" range', () => {
    const intent = matchPricePatterns('€50 tot €80 jurk')
    expect(intent).toMatchObject({ minPrice: 50, maxPrice: 80, source: 'regex_range' })
    expect(intent?.matches[0]?.text).toBe('€50 tot €80')
  })

  it('ignores a "tot" range without currency', () => {
    expect(matchPricePatterns('sneakers 38 - 42')).toBeNull()
  })

  it('skips a size range and reads the price range after it', () => {
    const intent = matchPricePatterns('sneakers maat 42-44 van 50-80 euro')
    expect(intent).toMatchObject({ minPrice: 50, maxPrice: 80, confidence: 0.95, source: 'regex_range' })
    expect(intent?.matches).toEqual([{ start: 24, end: 34, text: '50-80 euro' }])
  })

  it('does not read a size as a price cap', () => {
    const intent = matchPricePatterns('jurk maat 38 tot 42 onder 50 euro')
    expect(intent).toMatchObject({ minPrice: null, maxPrice: 50, confidence: 0.9, source: 'regex_range' })
    expect(intent?.matches).toEqual([{ start: 20, end: 33, text: 'onder 50 euro' }])
    expect(matchPricePatterns('jurk maat 38 tot 42')).toBeNull()
  })

  it('reads "tot" as a cap only next to a currency or price word', () => {
    expect(matchPricePatterns('jurk tot 60 euro')).toMatchObject({ minPrice: null, maxPrice: 60 })
    expect(matchPricePatterns('jurk prijs tot 60')?.matches[0]?.text).toBe('prijs tot 60')
    expect(matchPricePatterns('jurk tot 60')).toBeNull()
  })

  it('reads upper bounds', () => {
    expect(matchPricePatterns('schoenen onder 50 euro')).toMatchObject({ minPrice: null, maxPrice: 50, confidence: 0.9 })
    expect(matchPricePatterns('schoenen 50 euro of minder')).toMatchObject({ minPrice: null, maxPrice: 50 })
    expect(matchPricePatterns('dress under €49,95')).toMatchObject({ maxPrice: 49.95 })
  })

  it('reads lower bounds', () => {
    expect(matchPricePatterns('jas vanaf 150 euro')).toMatchObject({ minPrice: 150, maxPrice: null, source: 'regex_range' })
    expect(matchPricePatterns('coat 300 euro or more')).toMatchObject({ minPrice: 300, maxPrice: null })
  })

  it('combines a lower and an upper bound into a range', () => {
    const intent = matchPricePatterns('schoenen boven 100 en onder 200 euro')
    expect(intent).toMatchObject({ minPrice: 100, maxPrice: 200, confidence: 0.9, source: 'regex_range' })
    expect(intent?.matches.map((m) => m.text)).toEqual(['boven 100', 'onder 200 euro'])
  })

  it('keeps the earlier bound and reports a conflict when bounds contradict', () => {
    const onConflict = vi.fn()
    const intent = matchPricePatterns('boven 100 onder 50', onConflict)
    expect(intent).toMatchObject({ minPrice: 100, maxPrice: null })
    expect(onConflict).toHaveBeenCalledWith({ kept: 'nl_above', discarded: 'nl_below', minPrice: 100, maxPrice: 50 })
  })

  it('spreads "rond X" by 20 percent', () => {
    expect(matchPricePatterns('rond 100 euro')).toMatchObject({
      minPrice: 80,
      maxPrice: 120,
      confidence: 0.8,
      source: 'regex_exact',
    })
  })

  it('spreads a bare amount by 10 percent', () => {
    expect(matchPricePatterns('sneakers 150€')).toMatchObject({ minPrice: 135, maxPrice: 165, confidence: 0.85 })
    expect(matchPricePatterns('€ 80 tas')).toMatchObject({ minPrice: 72, maxPrice: 88 })
  })

  it('never returns min above max for generated ranges', () => {
    const amounts = [1, 9.5, 20, 75, 120, 999, 1500]
    for (const a of amounts) {
      for (const b of amounts) {
        for (const phrase of [`tussen ${a} en ${b} euro`, `between ${a} and ${b} euro`, `€${a} - €${b}`]) {
          const intent = matchPricePatterns(phrase)
          expect(intent).not.toBeNull()
          expect(intent?.minPrice).toBe(roundPrice(Math.min(a, b)))
          expect(intent?.maxPrice).toBe(roundPrice(Math.max(a, b)))
        }
      }
    }
  })
})
