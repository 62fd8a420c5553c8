import { Expression } from './expression.ts'
import { NumberNode, VariableNode } from './nodes.ts'
import { createBinary } from './operators.ts'
import type { BinaryOperator } from './types.ts'

/**
 * Operand accepted wherever an expression is expected.
 * Numbers become constants and strings become variables.
 */
export type ExpressionInput = Expression | number | string

export function constant(value: number): Expression {
	if (typeof value !== 'number') {
		throw new TypeError('Constant value must be a number')
	}
	return new Expression(new NumberNode(value))
}

export function variable(name: string): Expression {
	if (typeof name !== 'string' || !VariableNode.isValidName(name)) {
		throw new TypeError(
			'Variable name must be a non-empty string without whitespace or parentheses',
		)
	}
	return new Expression(new VariableNode(name))
}

export function toExpression(input: ExpressionInput): Expression {
	if (typeof input === 'number') {
		return constant(input)
	}
	if (typeof input === 'string') {
		return variable(input)
	}
	return input
}

function binary(op: BinaryOperator, left: ExpressionInput, right: ExpressionInput): Expression {
	return new Expression(createBinary(op, toExpression(left).node, toExpression(right).node))
}

export function add(left: ExpressionInput, right: ExpressionInput): Expression {
	return binary('add', left, right)
}

export function subtract(left: ExpressionInput, right: ExpressionInput): Expression {
	return binary('subtract', left, right)
}

export function multiply(left: ExpressionInput, right: ExpressionInput): Expression {
	return binary('multiply', left, right)
}

export function divide(left: ExpressionInput, right: ExpressionInput): Expression {
	return binary('divide', left, right)
}

export function power(base: ExpressionInput, exponent: ExpressionInput): Expression {
	return binary('power', base, exponent)
}
