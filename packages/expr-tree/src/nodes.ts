import type { ExprNode } from './types.ts'

export class NumberNode {
	readonly kind = 'number'
	readonly value: number

	static is(node: ExprNode): node is NumberNode {
		return node.kind === 'number'
	}

	static isValue(node: ExprNode, value: number): boolean {
		return node.kind === 'number' && node.value === value
	}

	constructor(value: number) {
		this.value = value
	}
}

const INVALID_NAME = /[\s()]/

export class VariableNode {
	readonly kind = 'variable'
	readonly name: string

	/** Non-empty, without whitespace or parentheses */
	static isValidName(name: string): boolean {
		return name.length > 0 && !INVALID_NAME.test(name)
	}

	constructor(name: string) {
		this.name = name
	}
}

abstract class BinaryNodeBase {
	readonly left: ExprNode
	readonly right: ExprNode

	constructor(left: ExprNode, right: ExprNode) {
		this.left = left
		this.right = right
	}
}

export class AddNode extends BinaryNodeBase {
	readonly kind = 'add'
}

export class SubtractNode extends BinaryNodeBase {
	readonly kind = 'subtract'
}

export class MultiplyNode extends BinaryNodeBase {
	readonly kind = 'multiply'
}

export class DivideNode extends BinaryNodeBase {
	readonly kind = 'divide'
}

export class PowerNode extends BinaryNodeBase {
	readonly kind = 'power'
}
