import { NotConstantExponentError } from './errors.ts'
import {
	AddNode,
	DivideNode,
	MultiplyNode,
	NumberNode,
	PowerNode,
	SubtractNode,
} from './nodes.ts'
import { render } from './render.ts'
import type { ExprNode } from './types.ts'

/**
 * Symbolic derivative with respect to `name`. The result is built structurally
 * and left unsimplified.
 */
export function derive(node: ExprNode, name: string): ExprNode {
	switch (node.kind) {
		case 'number':
			return new NumberNode(0)
		case 'variable':
			return new NumberNode(node.name === name ? 1 : 0)
		case 'add':
			return new AddNode(derive(node.left, name), derive(node.right, name))
		case 'subtract':
			return new SubtractNode(derive(node.left, name), derive(node.right, name))
		case 'multiply':
			return new AddNode(
				new MultiplyNode(node.left, derive(node.right, name)),
				new MultiplyNode(node.right, derive(node.left, name)),
			)
		case 'divide': {
			const { left, right } = node
			const numerator = new SubtractNode(
				new MultiplyNode(right, derive(left, name)),
				new MultiplyNode(left, derive(right, name)),
			)
			return new DivideNode(numerator, new MultiplyNode(right, right))
		}
		case 'power': {
			const { left: base, right: exponent } = node
			if (!NumberNode.is(exponent)) {
				throw new NotConstantExponentError(render(exponent))
			}
			// n * base ** (n - 1) * base'; n - 1 stays a literal so the result can be derived again
			const lowered = new PowerNode(base, new NumberNode(exponent.value - 1))
			return new MultiplyNode(
				new MultiplyNode(new NumberNode(exponent.value), lowered),
				derive(base, name),
			)
		}
	}
}
