import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../src/errors.js'
import { validateCardId, validateSearchParams } from '../../src/paramValidation.js'
import { defaultSearch } from '../fixtures/testConfig.js'

// --- validateSearchParams ---

describe('validateSearchParams', () => {
  it('accepts the dashboard defaults', () => {
    expect(validateSearchParams(defaultSearch)).toBeNull()
  })

  it('accepts both limit bounds', () => {
    expect(validateSearchParams({ ...defaultSearch, limit: 1 })).toBeNull()
    expect(validateSearchParams({ ...defaultSearch, limit: 10_000 })).toBeNull()
  })

  it('accepts empty fragments', () => {
    expect(validateSearchParams({ ...defaultSearch, nameFragment: '', setFragment: '' })).toBeNull()
  })

  it('rejects a limit of zero', () => {
    const err = validateSearchParams({ ...defaultSearch, limit: 0 })
    expect(err).toBeInstanceOf(ValidationError)
    expect(err?.operation).toBe('cardSearch')
    expect(err?.errors[0]?.message).toBe('limit must be an integer in 1..10000, got 0')
  })

  it('rejects fractional and oversized limits', () => {
    expect(validateSearchParams({ ...defaultSearch, limit: 2.5 })?.errors[0]?.details.parameter).toBe('limit')
    expect(validateSearchParams({ ...defaultSearch, limit: 10_001 })?.errors[0]?.details.parameter).toBe('limit')
    expect(validateSearchParams({ ...defaultSearch, limit: Number.NaN })?.errors[0]?.details.parameter).toBe('limit')
  })

  it('collects every failing rule', () => {
    const err = validateSearchParams({ nameFragment: 'x'.repeat(201), setFragment: 'y'.repeat(201), limit: -1 })
    expect(err?.errors.map((e) => e.details.parameter)).toEqual(['nameFragment', 'setFragment', 'limit'])
  })
})

// --- validateCardId ---

describe('validateCardId', () => {
  it('accepts a card uuid', () => {
    expect(validateCardId('ecc1027a-8c07-44a0-bdde-fa2844cff694')).toBeNull()
  })

  it('requires a non-blank id', () => {
    const err = validateCardId('  ')
    expect(err?.operation).toBe('priceHistory')
    expect(err?.errors[0]?.code).toBe('MISSING_PARAMETER')
  })

  it('rejects ids longer than 128 chars', () => {
    expect(validateCardId('a'.repeat(129))?.errors[0]?.code).toBe('INVALID_PARAMETER')
  })
})
