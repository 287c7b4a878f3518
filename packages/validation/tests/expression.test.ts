import { describe, expect, it } from 'vitest'
import { CheckError } from '../src/errors.js'
import { isValidOperand, parseTableRef, validateOperands } from '../src/expression/operands.js'
import { parseExpression } from '../src/expression/parser.js'
import type { ParsedExpression, ValidatedExpression } from '../src/types/check.js'

// --- Helpers ---

function parsed(expression: string): ParsedExpression {
  const result = parseExpression(expression)
  if (result instanceof CheckError) throw new Error(`unexpected parse failure: ${result.message}`)
  return result
}

function validated(expression: string): ValidatedExpression {
  const result = validateOperands(parsed(expression))
  if (result instanceof CheckError) throw new Error(`unexpected operand failure: ${result.message}`)
  return result
}

// --- parseExpression ---

describe('parseExpression', () => {
  it('splits on a single equals sign', () => {
    expect(parseExpression('one=two')).toEqual({ lhs: 'one', operator: '=', rhs: 'two' })
  })

  it('keeps surrounding whitespace inside the operands', () => {
    expect(parseExpression('bad_has_time = 0')).toEqual({ lhs: 'bad_has_time ', operator: '=', rhs: ' 0' })
  })

  it.each([
    ['a<>b', '<>'],
    ['a>=b', '>='],
    ['a<=b', '<='],
    ['a<b', '<'],
    ['a>b', '>'],
  ] as const)('recognizes %s', (expression, operator) => {
    const result = parsed(expression)
    expect(result.operator).toBe(operator)
    expect(result.lhs).toBe('a')
    expect(result.rhs).toBe('b')
  })

  it('accepts arithmetic and qualified names on both sides', () => {
    expect(parseExpression('work.a + b*2 >= lib.c - 1')).toEqual({
      lhs: 'work.a + b*2 ',
      operator: '>=',
      rhs: ' lib.c - 1',
    })
  })

  it.each([
    ['missing comparator', 'one two'],
    ['two comparators', 'a = b = c'],
    ['reversed comparator', 'a => b'],
    ['empty left operand', '=b'],
    ['empty right operand', 'a='],
    ['disallowed character', 'a = b / 2'],
    ['quote', "a = 'b'"],
    ['semicolon', 'a = b; drop table c'],
    ['separated comparator', 'a < > b'],
    ['empty string', ''],
  ])('rejects %s', (_label, expression) => {
    const result = parseExpression(expression)
    expect(result).toBeInstanceOf(CheckError)
    if (result instanceof CheckError) {
      expect(result.code).toBe('MALFORMED_EXPRESSION')
      expect(result.details).toEqual({ code: 'MALFORMED_EXPRESSION', expression })
    }
  })
})

// --- isValidOperand ---

describe('isValidOperand', () => {
  it.each([
    'one',
    ' one ',
    '42',
    'good_records - 3',
    'a+b*c-1',
    '_staging',
    'work.orders',
    '_lib.t',
    'a12345678.t',
    `t${'x'.repeat(32)}`,
  ])('accepts %j', (operand) => {
    expect(isValidOperand(operand)).toBe(true)
  })

  it.each([
    '',
    '   ',
    '3two',
    'a b',
    'a +',
    '+ a',
    'a ++ b',
    '1.5',
    'a..b',
    'a.b.c',
    '.a',
    'a1234567890.t',
    `t${'x'.repeat(33)}`,
  ])('rejects %j', (operand) => {
    expect(isValidOperand(operand)).toBe(false)
  })
})

// --- validateOperands ---

describe('validateOperands', () => {
  it('builds terms and operators left to right', () => {
    const result = validated('work.a + 2 * b = c')
    expect(result.operator).toBe('=')
    expect(result.lhs.terms).toEqual([
      { kind: 'table', text: 'work.a', ref: { namespace: 'work', name: 'a' } },
      { kind: 'literal', text: '2', value: 2n },
      { kind: 'table', text: 'b', ref: { name: 'b' } },
    ])
    expect(result.lhs.operators).toEqual(['+', '*'])
    expect(result.rhs.terms).toEqual([{ kind: 'table', text: 'c', ref: { name: 'c' } }])
    expect(result.rhs.operators).toEqual([])
  })

  it('names the right-hand side when only it is invalid', () => {
    const result = validateOperands(parsed('one<=3two'))
    expect(result).toBeInstanceOf(CheckError)
    if (result instanceof CheckError) {
      expect(result.code).toBe('INVALID_OPERAND')
      expect(result.details).toEqual({ code: 'INVALID_OPERAND', side: 'rhs', lhs: 'one', rhs: '3two' })
      expect(result.message).toBe("Invalid right-hand operand '3two'")
    }
  })

  it('names the left-hand side when only it is invalid', () => {
    const result = validateOperands(parsed('1x + a = b'))
    expect(result).toBeInstanceOf(CheckError)
    if (result instanceof CheckError) {
      expect(result.details).toMatchObject({ side: 'lhs' })
      expect(result.message).toBe("Invalid left-hand operand '1x + a'")
    }
  })

  it('reports both sides when neither is valid', () => {
    const result = validateOperands(parsed('1x = 2y'))
    expect(result).toBeInstanceOf(CheckError)
    if (result instanceof CheckError) {
      expect(result.details).toMatchObject({ side: 'both' })
      expect(result.message).toBe("Invalid operands on both sides: '1x' and '2y'")
    }
  })

  it('rejects a whitespace-only operand', () => {
    const result = validateOperands(parsed('a = '))
    expect(result).toBeInstanceOf(CheckError)
    if (result instanceof CheckError) {
      expect(result.details).toMatchObject({ side: 'rhs' })
    }
  })
})

// --- parseTableRef ---

describe('parseTableRef', () => {
  it('splits a qualified name', () => {
    expect(parseTableRef('work.orders')).toEqual({ namespace: 'work', name: 'orders' })
  })

  it('leaves an unqualified name without namespace', () => {
    expect(parseTableRef('orders')).toEqual({ name: 'orders' })
  })
})
