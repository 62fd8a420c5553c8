import { OPERATORS, precedenceOf } from './operators.ts'
import type { ExprNode } from './types.ts'

function formatNumber(value: number): string {
	return String(value)
}

function renderChild(child: ExprNode, parentPrecedence: number, wrapAtEqual: boolean): string {
	const text = render(child)
	const precedence = precedenceOf(child)
	if (precedence < parentPrecedence || (precedence === parentPrecedence && wrapAtEqual)) {
		return `(${text})`
	}
	return text
}

/**
 * Infix text with only the parentheses that precedence and associativity require.
 */
export function render(node: ExprNode): string {
	switch (node.kind) {
		case 'number':
			return formatNumber(node.value)
		case 'variable':
			return node.name
		default: {
			const info = OPERATORS[node.kind]
			const left = renderChild(node.left, info.precedence, info.wrapLeft)
			const right = renderChild(node.right, info.precedence, info.wrapRight)
			return `${left} ${info.symbol} ${right}`
		}
	}
}

/**
 * Fully-parenthesized text accepted by `parse`.
 */
export function serialize(node: ExprNode): string {
	switch (node.kind) {
		case 'number':
			return formatNumber(node.value)
		case 'variable':
			return node.name
		default:
			return `(${serialize(node.left)} ${OPERATORS[node.kind].symbol} ${serialize(node.right)})`
	}
}

export function repr(node: ExprNode): string {
	switch (node.kind) {
		case 'number':
			return `Num(${formatNumber(node.value)})`
		case 'variable':
			return `Var('${node.name}')`
		default:
			return `${OPERATORS[node.kind].label}(${repr(node.left)}, ${repr(node.right)})`
	}
}
