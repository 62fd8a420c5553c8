import { describe, expect, it } from 'vitest'
import {
	add,
	constant,
	divide,
	multiply,
	parse,
	power,
	subtract,
	UndefinedVariableError,
	variable,
} from '../src/index.ts'

describe('evaluation', () => {
	describe('leaves', () => {
		it('evaluates constants without bindings', () => {
			expect(constant(42).evaluate()).toBe(42)
		})

		it('looks up variables in a record', () => {
			expect(variable('x').evaluate({ x: 3 })).toBe(3)
		})

		it('looks up variables in a map', () => {
			expect(variable('x').evaluate(new Map([['x', 3]]))).toBe(3)
		})
	})

	describe('operators', () => {
		it('evaluates a parsed expression', () => {
			expect(parse('(x * (2 + 3))').evaluate({ x: 4 })).toBe(20)
		})

		it('respects operand order', () => {
			expect(subtract(10, 'x').evaluate({ x: 3 })).toBe(7)
			expect(subtract('x', 10).evaluate({ x: 3 })).toBe(-7)
			expect(divide(1, 'x').evaluate({ x: 4 })).toBe(0.25)
		})

		it('divides without truncating', () => {
			expect(divide(7, 2).evaluate()).toBe(3.5)
		})

		it('supports negative and fractional exponents', () => {
			expect(power(2, -1).evaluate()).toBe(0.5)
			expect(power(4, 0.5).evaluate()).toBe(2)
			expect(power('x', 3).evaluate({ x: -2 })).toBe(-8)
		})

		it('evaluates nested operations', () => {
			// (x + 1) * (x - 1) = x ** 2 - 1
			const expr = multiply(add('x', 1), subtract('x', 1))
			expect(expr.evaluate({ x: 5 })).toBe(24)
		})

		it('uses the same binding for repeated variables', () => {
			const expr = add('x', multiply('x', 'x'))
			expect(expr.evaluate({ x: 3 })).toBe(12)
		})

		it('ignores bindings the expression does not use', () => {
			expect(add('x', 1).evaluate({ x: 1, unused: 100 })).toBe(2)
		})
	})

	describe('division by zero', () => {
		it('follows IEEE-754', () => {
			expect(divide(1, 0).evaluate()).toBe(Number.POSITIVE_INFINITY)
			expect(divide(-1, 'x').evaluate({ x: 0 })).toBe(Number.NEGATIVE_INFINITY)
			expect(divide(0, 0).evaluate()).toBeNaN()
		})
	})

	describe('unbound variables', () => {
		it('throws UndefinedVariableError', () => {
			expect(() => parse('(x)').evaluate({})).toThrow(UndefinedVariableError)
			expect(() => parse('(x)').evaluate({})).toThrow("Variable 'x' has no binding")
		})

		it('reports the missing name', () => {
			const expr = add('x', 'y')
			try {
				expr.evaluate({ x: 1 })
				expect.unreachable()
			} catch (error) {
				expect.assert(error instanceof UndefinedVariableError)
				expect(error.variable).toBe('y')
			}
		})

		it('does not read inherited properties of a record', () => {
			expect(() => variable('toString').evaluate({})).toThrow(UndefinedVariableError)
		})

		it('throws for names missing from a map', () => {
			expect(() => variable('x').evaluate(new Map())).toThrow(UndefinedVariableError)
		})
	})
})
