import { UndefinedVariableError } from './errors.ts'
import { OPERATORS } from './operators.ts'
import type { Bindings, ExprNode } from './types.ts'

function isMap(bindings: Bindings): bindings is ReadonlyMap<string, number> {
	return bindings instanceof Map
}

function lookup(bindings: Bindings, name: string): number | undefined {
	if (isMap(bindings)) {
		return bindings.get(name)
	}
	return Object.hasOwn(bindings, name) ? bindings[name] : undefined
}

/**
 * Evaluate with IEEE-754 semantics: division by zero yields an infinity or NaN
 * rather than throwing.
 */
export function evaluate(node: ExprNode, bindings: Bindings): number {
	switch (node.kind) {
		case 'number':
			return node.value
		case 'variable': {
			const value = lookup(bindings, node.name)
			if (value === undefined) {
				throw new UndefinedVariableError(node.name)
			}
			return value
		}
		default:
			return OPERATORS[node.kind].compute(
				evaluate(node.left, bindings),
				evaluate(node.right, bindings),
			)
	}
}
