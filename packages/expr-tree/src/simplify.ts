import { AddNode, DivideNode, MultiplyNode, NumberNode, PowerNode, SubtractNode } from './nodes.ts'
import type { ExprNode } from './types.ts'

// Rule order within each function is significant, e.g. 0 ** 0 must reach the
// zero-exponent rule before the zero-base rule.

function simplifyAdd(left: ExprNode, right: ExprNode): ExprNode {
	if (NumberNode.isValue(left, 0)) {
		return right
	}
	if (NumberNode.isValue(right, 0)) {
		return left
	}
	if (NumberNode.is(left) && NumberNode.is(right)) {
		return new NumberNode(left.value + right.value)
	}
	return new AddNode(left, right)
}

function simplifySubtract(left: ExprNode, right: ExprNode): ExprNode {
	if (NumberNode.isValue(right, 0)) {
		return left
	}
	if (NumberNode.is(left) && NumberNode.is(right)) {
		return new NumberNode(left.value - right.value)
	}
	return new SubtractNode(left, right)
}

function simplifyMultiply(left: ExprNode, right: ExprNode): ExprNode {
	if (NumberNode.isValue(left, 0) || NumberNode.isValue(right, 0)) {
		return new NumberNode(0)
	}
	if (NumberNode.isValue(left, 1)) {
		return right
	}
	if (NumberNode.isValue(right, 1)) {
		return left
	}
	if (NumberNode.is(left) && NumberNode.is(right)) {
		return new NumberNode(left.value * right.value)
	}
	return new MultiplyNode(left, right)
}

function simplifyDivide(left: ExprNode, right: ExprNode): ExprNode {
	// Fires even for 0 / 0
	if (NumberNode.isValue(left, 0)) {
		return new NumberNode(0)
	}
	if (NumberNode.isValue(right, 1)) {
		return left
	}
	if (NumberNode.is(left) && NumberNode.is(right)) {
		return new NumberNode(left.value / right.value)
	}
	return new DivideNode(left, right)
}

function simplifyPower(base: ExprNode, exponent: ExprNode): ExprNode {
	if (NumberNode.isValue(exponent, 0)) {
		return new NumberNode(1)
	}
	if (NumberNode.isValue(exponent, 1)) {
		return base
	}
	if (NumberNode.isValue(base, 0)) {
		return new NumberNode(0)
	}
	if (NumberNode.is(base) && NumberNode.is(exponent)) {
		return new NumberNode(base.value ** exponent.value)
	}
	return new PowerNode(base, exponent)
}

export function simplify(node: ExprNode): ExprNode {
	switch (node.kind) {
		case 'number':
		case 'variable':
			return node
		case 'add':
			return simplifyAdd(simplify(node.left), simplify(node.right))
		case 'subtract':
			return simplifySubtract(simplify(node.left), simplify(node.right))
		case 'multiply':
			return simplifyMultiply(simplify(node.left), simplify(node.right))
		case 'divide':
			return simplifyDivide(simplify(node.left), simplify(node.right))
		case 'power':
			return simplifyPower(simplify(node.left), simplify(node.right))
	}
}
