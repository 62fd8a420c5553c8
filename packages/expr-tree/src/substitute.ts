import { createBinary } from './operators.ts'
import type { ExprNode } from './types.ts'

/**
 * Replace variables with their bound nodes. No folding happens here.
 */
export function substitute(node: ExprNode, bindings: ReadonlyMap<string, ExprNode>): ExprNode {
	switch (node.kind) {
		case 'number':
			return node
		case 'variable':
			return bindings.get(node.name) ?? node
		default:
			return createBinary(
				node.kind,
				substitute(node.left, bindings),
				substitute(node.right, bindings),
			)
	}
}

export function collectVariables(node: ExprNode, into: Set<string> = new Set()): Set<string> {
	switch (node.kind) {
		case 'number':
			break
		case 'variable':
			into.add(node.name)
			break
		default:
			collectVariables(node.left, into)
			collectVariables(node.right, into)
	}
	return into
}
