import type { ExprNode } from './types.ts'

// NaN literals compare equal to each other so that structural equality is reflexive
function sameNumber(a: number, b: number): boolean {
	return a === b || (Number.isNaN(a) && Number.isNaN(b))
}

export function equals(a: ExprNode, b: ExprNode): boolean {
	switch (a.kind) {
		case 'number':
			return b.kind === 'number' && sameNumber(a.value, b.value)
		case 'variable':
			return b.kind === 'variable' && a.name === b.name
		default:
			return (
				b.kind !== 'number' &&
				b.kind !== 'variable' &&
				a.kind === b.kind &&
				equals(a.left, b.left) &&
				equals(a.right, b.right)
			)
	}
}
