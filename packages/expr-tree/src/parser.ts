import { ParseError, UnknownOperatorError } from './errors.ts'
import { Expression } from './expression.ts'
import { NumberNode, VariableNode } from './nodes.ts'
import { createBinary, operatorForSymbol } from './operators.ts'
import { tokenize } from './tokenizer.ts'
import type { ExprNode, ParseOptions } from './types.ts'

const DEFAULT_MAX_DEPTH = 1000

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i
// Spellings produced when rendering non-finite values
const NON_FINITE = /^(?:[+-]?Infinity|NaN)$/

interface ParserState {
	readonly tokens: readonly string[]
	readonly strict: boolean
	readonly maxDepth: number
}

type ParseStep = [node: ExprNode, next: number]

function parseNumber(token: string): number | undefined {
	return DECIMAL.test(token) || NON_FINITE.test(token) ? Number(token) : undefined
}

function describeToken(token: string | undefined): string {
	return token === undefined ? 'end of input' : `'${token}'`
}

function parseExpression(state: ParserState, index: number, depth: number): ParseStep {
	const token: string | undefined = state.tokens[index]
	if (token === undefined) {
		throw new ParseError(`Expected an operand at token ${index}, found end of input`, index)
	}

	const value = parseNumber(token)
	if (value !== undefined) {
		return [new NumberNode(value), index + 1]
	}
	if (token === ')') {
		throw new ParseError(`Expected an operand at token ${index}, found ')'`, index, token)
	}
	if (token !== '(') {
		// Reachable only through pre-tokenized input
		if (!VariableNode.isValidName(token)) {
			throw new ParseError(`Invalid variable name '${token}' at token ${index}`, index, token)
		}
		return [new VariableNode(token), index + 1]
	}

	if (depth >= state.maxDepth) {
		throw new ParseError(
			`Nesting at token ${index} exceeds the maximum depth of ${state.maxDepth}`,
			index,
			token,
		)
	}

	const [left, operatorIndex] = parseExpression(state, index + 1, depth + 1)
	const symbol: string | undefined = state.tokens[operatorIndex]
	if (symbol === undefined) {
		throw new ParseError(
			`Expected an operator at token ${operatorIndex}, found end of input`,
			operatorIndex,
		)
	}
	// "( expr )" groups a single operand
	if (symbol === ')') {
		return [left, operatorIndex + 1]
	}
	const op = operatorForSymbol(symbol)
	if (op === undefined) {
		throw new UnknownOperatorError(operatorIndex, symbol)
	}

	const [right, closeIndex] = parseExpression(state, operatorIndex + 1, depth + 1)
	// Without `strict` the closing token is assumed, not checked
	if (state.strict && state.tokens[closeIndex] !== ')') {
		const found: string | undefined = state.tokens[closeIndex]
		throw new ParseError(
			`Expected ')' at token ${closeIndex}, found ${describeToken(found)}`,
			closeIndex,
			found,
		)
	}
	return [createBinary(op, left, right), closeIndex + 1]
}

/**
 * Parse fully-parenthesized infix text, e.g. `(x * (2 + 3))`.
 *
 * By default the closing `)` of each application is not verified and tokens
 * after the first complete expression are ignored; pass `strict: true` to
 * reject both.
 *
 * @example
 * ```ts
 * parse('(x * (2 + 3))').render() // 'x * (2 + 3)'
 * ```
 */
export function parse(input: string | readonly string[], options: ParseOptions = {}): Expression {
	const strict = options.strict ?? false
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
	if (!Number.isInteger(maxDepth) || maxDepth < 0) {
		throw new RangeError('maxDepth must be a non-negative integer')
	}

	const tokens = typeof input === 'string' ? tokenize(input) : input
	if (tokens.length === 0) {
		throw new ParseError('Cannot parse empty input', 0)
	}

	const [node, next] = parseExpression({ tokens, strict, maxDepth }, 0, 0)
	if (strict && next < tokens.length) {
		throw new ParseError(
			`Unexpected token '${tokens[next]}' at token ${next} after a complete expression`,
			next,
			tokens[next],
		)
	}
	return new Expression(node)
}
