import { createTransaction, isIsoDate, safeCreateTransaction, toTransactionRecord } from '../transaction'
import { TransactionValidationError } from '../errors'
import { TransactionInput } from '../types'

function makeInput(overrides: Partial<TransactionInput> = {}): TransactionInput {
  return {
    description: 'Coffee',
    amount: 2.5,
    date: '2025-12-01',
    category: 'Food',
    ...overrides,
  }
}

function validationError(input: TransactionInput): TransactionValidationError {
  const result = safeCreateTransaction(input)
  if (result.success) {
    throw new Error('expected validation to fail')
  }
  return result.error
}

describe('Transaction', () => {
  describe('createTransaction', () => {
    it('should build a transaction with a null id before persistence', () => {
      expect(createTransaction(makeInput())).toEqual({
        id: null,
        description: 'Coffee',
        amount: 2.5,
        date: '2025-12-01',
        category: 'Food',
      })
    })

    it('should trim description and category', () => {
      const t = createTransaction(makeInput({ description: '  Rent  ', category: ' Housing ' }))

      expect(t.description).toBe('Rent')
      expect(t.category).toBe('Housing')
    })

    it('should accept numeric strings and negative amounts', () => {
      expect(createTransaction(makeInput({ amount: '-42.10' })).amount).toBe(-42.1)
      expect(createTransaction(makeInput({ amount: -500 })).amount).toBe(-500)
    })

    it('should keep a persisted id', () => {
      expect(createTransaction(makeInput({ id: 7 })).id).toBe(7)
    })

    it('should throw TransactionValidationError for invalid input', () => {
      expect(() => createTransaction(makeInput({ amount: 0 }))).toThrow(TransactionValidationError)
      expect(() => createTransaction(makeInput({ amount: 0 }))).toThrow('Amount cannot be zero')
    })
  })

  describe('validation failures', () => {
    it('should reject an empty description', () => {
      const error = validationError(makeInput({ description: '   ' }))

      expect(error.field).toBe('description')
      expect(error.message).toBe('Description cannot be empty')
    })

    it('should reject a missing description', () => {
      expect(validationError(makeInput({ description: null })).field).toBe('description')
    })

    it('should reject a zero amount', () => {
      const error = validationError(makeInput({ amount: 0 }))

      expect(error.field).toBe('amount')
      expect(error.message).toBe('Amount cannot be zero')
    })

    it('should reject a non-numeric amount', () => {
      const error = validationError(makeInput({ amount: 'ten' }))

      expect(error.field).toBe('amount')
      expect(error.message).toBe('Amount must be a number')
    })

    it('should reject an empty category', () => {
      const error = validationError(makeInput({ category: '' }))

      expect(error.field).toBe('category')
      expect(error.message).toBe('Category cannot be empty')
    })

    it('should reject an unparseable date', () => {
      const error = validationError(makeInput({ date: 'yesterday' }))

      expect(error.field).toBe('date')
      expect(error.message).toBe('Invalid date format: yesterday. Expected YYYY-MM-DD')
    })

    it('should reject a date that does not exist on the calendar', () => {
      expect(validationError(makeInput({ date: '2025-02-30' })).field).toBe('date')
    })

    it('should report the first invalid field when several are wrong', () => {
      expect(validationError(makeInput({ description: '', amount: 0 })).field).toBe('description')
    })
  })

  describe('isIsoDate', () => {
    it('should accept real YYYY-MM-DD dates', () => {
      expect(isIsoDate('2024-02-29')).toBe(true)
      expect(isIsoDate('2025-12-31')).toBe(true)
    })

    it('should reject other shapes and impossible dates', () => {
      expect(isIsoDate('2025-2-1')).toBe(false)
      expect(isIsoDate('01/12/2025')).toBe(false)
      expect(isIsoDate('2025-13-01')).toBe(false)
      expect(isIsoDate('2023-02-29')).toBe(false)
    })
  })

  describe('toTransactionRecord', () => {
    it('should copy every field', () => {
      const t = createTransaction(makeInput({ id: 3 }))

      expect(toTransactionRecord(t)).toEqual({
        id: 3,
        description: 'Coffee',
        amount: 2.5,
        date: '2025-12-01',
        category: 'Food',
      })
    })
  })
})
