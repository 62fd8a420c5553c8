import * as fc from 'fast-check'
import {
	add,
	constant,
	divide,
	type Expression,
	multiply,
	power,
	subtract,
	variable,
} from '../src/index.ts'

export const VARIABLES = ['x', 'y', 'z'] as const

const smallIntegerArb = fc.integer({ min: -5, max: 5 })
const nonZeroIntegerArb = smallIntegerArb.filter((value) => value !== 0)

const leafArb = fc.oneof(
	smallIntegerArb.map((value) => constant(value)),
	fc.constantFrom(...VARIABLES).map((name) => variable(name)),
)

export const bindingsArb = fc.record({
	x: smallIntegerArb,
	y: smallIntegerArb,
	z: smallIntegerArb,
})

/**
 * Any tree over all five operators, including ones that divide by zero.
 */
export const expressionArb = fc.letrec<{ expr: Expression }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 4, depthIdentifier: 'expr' },
		leafArb,
		fc
			.tuple(
				fc.constantFrom(add, subtract, multiply, divide, power),
				tie('expr'),
				tie('expr'),
			)
			.map(([build, left, right]) => build(left, right)),
	),
})).expr

/**
 * Leaves carry arbitrary doubles, NaN and the infinities included.
 */
export const anyNumberExpressionArb = fc.letrec<{ expr: Expression }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 3, depthIdentifier: 'any-number' },
		fc.double().map((value) => constant(value)),
		fc.constantFrom(...VARIABLES).map((name) => variable(name)),
		fc
			.tuple(
				fc.constantFrom(add, subtract, multiply, divide, power),
				tie('expr'),
				tie('expr'),
			)
			.map(([build, left, right]) => build(left, right)),
	),
})).expr

/**
 * Trees whose value is defined for every integer binding: divisors are
 * non-zero literals and exponents are small non-negative literals.
 */
export const definedExpressionArb = fc.letrec<{ expr: Expression }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 4, depthIdentifier: 'defined' },
		leafArb,
		fc
			.tuple(fc.constantFrom(add, subtract, multiply), tie('expr'), tie('expr'))
			.map(([build, left, right]) => build(left, right)),
		fc.tuple(tie('expr'), nonZeroIntegerArb).map(([left, divisor]) => divide(left, divisor)),
		fc
			.tuple(tie('expr'), fc.integer({ min: 0, max: 3 }))
			.map(([base, exponent]) => power(base, exponent)),
	),
})).expr

/**
 * Differentiable trees in `x` alone.
 */
export const polynomialArb = fc.letrec<{ expr: Expression }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 3, depthIdentifier: 'polynomial' },
		fc.oneof(
			fc.integer({ min: -3, max: 3 }).map((value) => constant(value)),
			fc.constant(variable('x')),
		),
		fc
			.tuple(fc.constantFrom(add, subtract, multiply), tie('expr'), tie('expr'))
			.map(([build, left, right]) => build(left, right)),
		fc
			.tuple(tie('expr'), fc.integer({ min: 1, max: 3 }))
			.map(([left, divisor]) => divide(left, divisor)),
		tie('expr').map((base) => power(base, 2)),
	),
})).expr

export const positiveBindingsArb = fc.record({
	x: fc.integer({ min: 1, max: 4 }),
	y: fc.integer({ min: 1, max: 4 }),
})

/**
 * Positive leaves in `x` and `y` only, so rendered text never puts a
 * negative literal in front of `**`.
 */
export const positiveExpressionArb = fc.letrec<{ expr: Expression }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 4, depthIdentifier: 'positive' },
		fc.oneof(
			fc.integer({ min: 1, max: 4 }).map((value) => constant(value)),
			fc.constantFrom('x', 'y').map((name) => variable(name)),
		),
		fc
			.tuple(
				fc.constantFrom(add, subtract, multiply, divide, power),
				tie('expr'),
				tie('expr'),
			)
			.map(([build, left, right]) => build(left, right)),
	),
})).expr
