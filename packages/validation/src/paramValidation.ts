import type { ValidationErrorEntry } from './errors.js'
import { ValidationError } from './errors.js'

export const MIN_SEARCH_LIMIT = 1
export const MAX_SEARCH_LIMIT = 10_000
export const MAX_FRAGMENT_LENGTH = 200
export const MAX_CARD_ID_LENGTH = 128

export interface SearchParams {
  readonly nameFragment: string
  readonly setFragment: string
  readonly limit: number
}

// --- Rules ---

function checkFragment(parameter: string, value: string, errors: ValidationErrorEntry[]): void {
  if (value.length > MAX_FRAGMENT_LENGTH) {
    errors.push({
      code: 'INVALID_PARAMETER',
      message: `${parameter} must be at most ${MAX_FRAGMENT_LENGTH} characters, got ${value.length}`,
      details: { parameter, expected: `<= ${MAX_FRAGMENT_LENGTH} characters`, actual: String(value.length) },
    })
  }
}

// --- Operation Params ---

export function validateSearchParams(params: SearchParams): ValidationError | null {
  const errors: ValidationErrorEntry[] = []

  checkFragment('nameFragment', params.nameFragment, errors)
  checkFragment('setFragment', params.setFragment, errors)

  if (!Number.isInteger(params.limit) || params.limit < MIN_SEARCH_LIMIT || params.limit > MAX_SEARCH_LIMIT) {
    errors.push({
      code: 'INVALID_PARAMETER',
      message: `limit must be an integer in ${MIN_SEARCH_LIMIT}..${MAX_SEARCH_LIMIT}, got ${params.limit}`,
      details: {
        parameter: 'limit',
        expected: `integer ${MIN_SEARCH_LIMIT}..${MAX_SEARCH_LIMIT}`,
        actual: String(params.limit),
      },
    })
  }

  return errors.length > 0 ? new ValidationError('cardSearch', errors) : null
}

export function validateCardId(cardId: string): ValidationError | null {
  const trimmed = cardId.trim()
  if (trimmed.length === 0) {
    return new ValidationError('priceHistory', [
      { code: 'MISSING_PARAMETER', message: 'cardId is required', details: { parameter: 'cardId' } },
    ])
  }
  if (trimmed.length > MAX_CARD_ID_LENGTH) {
    return new ValidationError('priceHistory', [
      {
        code: 'INVALID_PARAMETER',
        message: `cardId must be at most ${MAX_CARD_ID_LENGTH} characters, got ${trimmed.length}`,
        details: { parameter: 'cardId', expected: `<= ${MAX_CARD_ID_LENGTH} characters`, actual: String(trimmed.length) },
      },
    ])
  }
  return null
}
